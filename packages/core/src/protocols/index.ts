export {
  type ClassifiedResponse,
  type ContentCategory,
  classifyResponse,
  describeResponse,
  type HandlingStrategy,
  ResponseBody,
  SESSION_ID_HEADER,
  type UpstreamResponseMeta
} from './classify';
export {
  createErrorResponse,
  isNotification,
  isRequest,
  isResponse,
  type JsonRpcErrorObject,
  type JsonRpcErrorResponse,
  type JsonRpcId,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type JsonRpcResultResponse,
  methodOf,
  type ProtocolMessage,
  ProtocolMessageSchema,
  type ProtocolPayload,
  ProtocolPayloadSchema,
  parseProtocolMessage,
  parseProtocolPayload,
  pendingRequestIds,
  RelayErrorCodes,
  toMessageList,
  toProtocolMessage
} from './jsonrpc';
export { accepts, isEventStream, isJson, type MediaType, parseMediaType } from './media-type';
export { formatSseComment, formatSseEvent, parseSseStream, type SseFeedResult, SseParser } from './sse';
