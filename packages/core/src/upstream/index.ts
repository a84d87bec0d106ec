export { HttpDispatcher, type HttpDispatcherOptions } from './http-dispatcher';
export { type CreateDispatchersOptions, createDispatchers, createStaticSelector } from './selector';
export { StdioDispatcher, type StdioDispatcherOptions } from './stdio-dispatcher';
export {
  type DispatchContext,
  LAST_EVENT_ID_HEADER,
  PROTOCOL_VERSION_HEADER,
  type UpstreamDispatcher
} from './types';
