import { OpenAPIHono } from '@hono/zod-openapi';
import {
  accepts,
  createErrorResponse,
  errorMessage,
  type HandleMessageInput,
  LAST_EVENT_ID_HEADER,
  type Logger,
  PROTOCOL_VERSION_HEADER,
  ProtocolPayloadSchema,
  type Relay,
  RelayError,
  RelayErrorCodes,
  type RelayResult,
  SESSION_ID_HEADER,
  silentLogger,
  ValidationError
} from '@mcp-relay/core';
import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { streamSSE } from 'hono/streaming';
import { Installation } from '../installation';
import { getStatusForError } from './errors';
import { healthRoute } from './openapi';
import type { ErrorResponse } from './schemas';

const EVENT_STREAM = 'text/event-stream';

export type ServerConfig = {
  /** Where the protocol endpoint is mounted, e.g. `/mcp` */
  path: string;
  logger?: Logger;
};

function protocolError(c: Context, code: number, message: string): Response {
  return c.json(createErrorResponse(null, code, message), 400);
}

function requireSessionId(c: Context): string {
  const sessionId = c.req.header(SESSION_ID_HEADER);
  if (!sessionId) {
    throw new ValidationError(`Missing ${SESSION_ID_HEADER} header`);
  }
  return sessionId;
}

/**
 * Translate a relay result into the HTTP response the client reads.
 */
function toResponse(c: Context, result: RelayResult): Response | Promise<Response> {
  switch (result.type) {
    case 'reply':
      return new Response(result.body, {
        status: result.status,
        headers: { 'content-type': 'application/json', [SESSION_ID_HEADER]: result.sessionId }
      });

    case 'accepted':
      return new Response(null, { status: 202, headers: { [SESSION_ID_HEADER]: result.sessionId } });

    case 'passthrough': {
      const headers = new Headers(result.headers);
      headers.set(SESSION_ID_HEADER, result.sessionId);
      return new Response(result.body, { status: result.status, headers });
    }

    case 'stream':
      c.header(SESSION_ID_HEADER, result.sessionId);
      return streamSSE(c, async (stream) => {
        stream.onAbort(() => result.cancel());
        try {
          for await (const event of result.events) {
            await stream.writeSSE(event);
          }
          await result.done;
        } finally {
          result.cancel();
        }
      });
  }
}

export function createApp(relay: Relay, config: ServerConfig) {
  const app = new OpenAPIHono();
  const logger = config.logger ?? silentLogger;

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    if (err instanceof RelayError) {
      const status = getStatusForError(err);
      if (status >= 500) {
        logger.warn(`${c.req.method} ${c.req.path} failed: ${err.message}`);
      }
      return c.json(err.toObject(), status);
    }

    logger.error(`Server error on ${c.req.method} ${c.req.path}: ${errorMessage(err)}`);
    const response: ErrorResponse = {
      error: {
        code: 'INTERNAL_ERROR',
        message: errorMessage(err)
      }
    };
    return c.json(response, 500);
  });

  // ============================================================================
  // Health Endpoint
  // ============================================================================

  app.openapi(healthRoute, async (c) => {
    return c.json(
      { healthy: true as const, version: Installation.VERSION, sessions: await relay.sessionCount() },
      200
    );
  });

  // ============================================================================
  // Protocol Endpoint
  // ============================================================================

  app.post(config.path, async (c) => {
    let raw: unknown;
    try {
      raw = JSON.parse(await c.req.text());
    } catch (err) {
      return protocolError(c, RelayErrorCodes.PARSE_ERROR, `Parse error: ${errorMessage(err)}`);
    }

    const parsed = ProtocolPayloadSchema.safeParse(raw);
    if (!parsed.success) {
      return protocolError(c, RelayErrorCodes.INVALID_REQUEST, 'Invalid Request: not a JSON-RPC message or batch');
    }

    const input: HandleMessageInput = {
      payload: parsed.data,
      clientTransport: accepts(c.req.header('accept'), EVENT_STREAM) ? 'sse' : 'http',
      signal: c.req.raw.signal
    };
    const sessionId = c.req.header(SESSION_ID_HEADER);
    if (sessionId) input.sessionId = sessionId;
    const protocolVersion = c.req.header(PROTOCOL_VERSION_HEADER);
    if (protocolVersion) input.protocolVersion = protocolVersion;

    return toResponse(c, await relay.handleMessage(input));
  });

  app.get(config.path, async (c) => {
    if (!accepts(c.req.header('accept'), EVENT_STREAM)) {
      const response: ErrorResponse = {
        error: { code: 'NOT_ACCEPTABLE', message: `Client must accept ${EVENT_STREAM}` }
      };
      return c.json(response, 406);
    }

    const sessionId = requireSessionId(c);
    const lastEventId = c.req.header(LAST_EVENT_ID_HEADER);
    const result = await relay.openStream(
      lastEventId ? { sessionId, lastEventId, signal: c.req.raw.signal } : { sessionId, signal: c.req.raw.signal }
    );
    return toResponse(c, result);
  });

  app.delete(config.path, async (c) => {
    await relay.terminateSession(requireSessionId(c));
    return c.body(null, 204);
  });

  // ============================================================================
  // OpenAPI Documentation
  // ============================================================================

  app.doc('/doc', {
    openapi: '3.0.0',
    info: { title: 'mcp-relay', version: Installation.VERSION }
  });

  return { app };
}
