import { z } from 'zod';

// ============================================================================
// JSON-RPC 2.0 message schemas
// ============================================================================

export const JsonRpcIdSchema = z.union([z.string(), z.number()]);

export const JsonRpcErrorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional()
});

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: JsonRpcIdSchema,
  method: z.string().min(1),
  params: z.unknown().optional()
});

export const JsonRpcNotificationSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string().min(1),
  params: z.unknown().optional()
});

export const JsonRpcResultResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: JsonRpcIdSchema,
  result: z.unknown().refine((value) => value !== undefined, { message: 'result is required' })
});

export const JsonRpcErrorResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([JsonRpcIdSchema, z.null()]),
  error: JsonRpcErrorObjectSchema
});

export type JsonRpcId = z.infer<typeof JsonRpcIdSchema>;
export type JsonRpcErrorObject = z.infer<typeof JsonRpcErrorObjectSchema>;
export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;
export type JsonRpcNotification = z.infer<typeof JsonRpcNotificationSchema>;
export type JsonRpcResultResponse = z.infer<typeof JsonRpcResultResponseSchema>;
export type JsonRpcErrorResponse = z.infer<typeof JsonRpcErrorResponseSchema>;
export type JsonRpcResponse = JsonRpcResultResponse | JsonRpcErrorResponse;

/**
 * One request, notification or response crossing the relay.
 */
export type ProtocolMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

// Order matters: error responses must be tried before result responses.
export const ProtocolMessageSchema: z.ZodType<ProtocolMessage, z.ZodTypeDef, unknown> = z.union([
  JsonRpcRequestSchema,
  JsonRpcNotificationSchema,
  JsonRpcErrorResponseSchema,
  JsonRpcResultResponseSchema
]);

export const ProtocolPayloadSchema = z.union([
  ProtocolMessageSchema,
  z.array(ProtocolMessageSchema).min(1)
]);

export type ProtocolPayload = ProtocolMessage | ProtocolMessage[];

// ============================================================================
// Guards
// Schemas strip unknown keys, so only parsed messages are narrowed here; raw
// payload text is what gets forwarded unless an interceptor substitutes it.
// ============================================================================

export function isRequest(message: ProtocolMessage): message is JsonRpcRequest {
  return 'method' in message && 'id' in message;
}

export function isNotification(message: ProtocolMessage): message is JsonRpcNotification {
  return 'method' in message && !('id' in message);
}

export function isResponse(message: ProtocolMessage): message is JsonRpcResponse {
  return !('method' in message) && ('result' in message || 'error' in message);
}

/**
 * Parse arbitrary text as a single protocol message.
 * Returns undefined for invalid JSON or anything that is not JSON-RPC 2.0.
 */
export function parseProtocolMessage(text: string): ProtocolMessage | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return undefined;
  }
  return toProtocolMessage(raw);
}

/** Validate an already-decoded value as a single protocol message. */
export function toProtocolMessage(value: unknown): ProtocolMessage | undefined {
  const parsed = ProtocolMessageSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Parse text as a message or a non-empty batch of messages.
 */
export function parseProtocolPayload(text: string): ProtocolPayload | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = ProtocolPayloadSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

export function toMessageList(payload: ProtocolPayload): ProtocolMessage[] {
  return Array.isArray(payload) ? payload : [payload];
}

/** Request ids a payload is waiting on; notifications and responses carry none. */
export function pendingRequestIds(payload: ProtocolPayload): JsonRpcId[] {
  return toMessageList(payload)
    .filter(isRequest)
    .map((msg) => msg.id);
}

export function methodOf(message: ProtocolMessage): string | undefined {
  return 'method' in message ? message.method : undefined;
}

export function createErrorResponse(
  id: JsonRpcId | null,
  code: number,
  message: string,
  data?: unknown
): JsonRpcErrorResponse {
  const error: JsonRpcErrorObject = data === undefined ? { code, message } : { code, message, data };
  return { jsonrpc: '2.0', id, error };
}

// Error codes used by the relay when it answers on the upstream's behalf.
export const RelayErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  BLOCKED: -32001,
  UPSTREAM_UNAVAILABLE: -32002,
  STREAM_EXHAUSTED: -32003
} as const;
