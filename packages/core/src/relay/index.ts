export { DEFAULT_MAX_REPLY_BYTES, readBoundedText } from './body';
export { createRelay, DEFAULT_RELAY_OPTIONS, Relay } from './relay';
export {
  type CreateRelayOptions,
  DEFAULT_PROTOCOL_VERSION,
  type HandleMessageInput,
  type OpenStreamInput,
  type RelayOptions,
  type RelayResult
} from './types';
