export { BoundedChannel, ChannelClosedError } from './channel';
export { IdleWatchdog } from './idle-watchdog';
export {
  DEFAULT_IDLE_TIMEOUT_MS,
  DEFAULT_TERMINATION_EVENTS,
  type PipelineEndReason,
  type PipelineOutcome,
  StreamPipeline,
  type StreamPipelineOptions
} from './pipeline';
export {
  computeBackoffDelay,
  DEFAULT_RECONNECT_POLICY,
  type ReconnectionManagerOptions,
  ReconnectionManager,
  type ReconnectPolicy,
  type ResumeFn,
  type SleepFn,
  type StreamState
} from './reconnect';
