import {
  createErrorResponse,
  errorMessage,
  type HandleMessageInput,
  type JsonRpcId,
  type Logger,
  methodOf,
  type ProtocolPayload,
  ProtocolPayloadSchema,
  parseProtocolMessage,
  parseProtocolPayload,
  pendingRequestIds,
  type Relay,
  RelayErrorCodes,
  type RelayResult,
  silentLogger,
  toMessageList
} from '@mcp-relay/core';

export type StdioClientConfig = {
  relay: Relay;
  /** Receives one serialized message per call, without the trailing newline */
  write: (line: string) => void;
  logger?: Logger;
};

export interface StdioClient {
  /** Handle one line read from the client */
  handleLine(line: string): void;
  /** Wait for in-flight requests, then stop the server-initiated stream */
  drain(): Promise<void>;
  /** Cancel the server-initiated stream, if one is open */
  close(): void;
}

/**
 * Serve a relay session to a client speaking newline-delimited JSON-RPC,
 * the way a locally spawned server would.
 *
 * Messages are dispatched concurrently once the session exists; until then
 * they queue behind the first, which creates it. The upstream's
 * server-initiated stream is opened once, after the first message that is not
 * an `initialize` request, and pumped to the client.
 */
function opensSession(payload: ProtocolPayload): boolean {
  return toMessageList(payload).some((message) => methodOf(message) === 'initialize');
}

export function createStdioClient(config: StdioClientConfig): StdioClient {
  const { relay, write } = config;
  const logger = config.logger ?? silentLogger;
  const inflight = new Set<Promise<void>>();
  let sessionId: string | undefined;
  let gate: Promise<void> = Promise.resolve();
  let listenCancel: (() => void) | undefined;
  let listenTask: Promise<void> | undefined;
  let closed = false;

  const track = (task: Promise<void>) => {
    inflight.add(task);
    void task.finally(() => inflight.delete(task));
  };

  const writeMessage = (message: unknown) => write(JSON.stringify(message));

  const failRequests = (ids: JsonRpcId[], code: number, message: string) => {
    if (ids.length === 0) {
      logger.warn(message);
      return;
    }
    for (const id of ids) {
      writeMessage(createErrorResponse(id, code, message));
    }
  };

  const pump = async (result: Extract<RelayResult, { type: 'stream' }>) => {
    try {
      for await (const event of result.events) {
        if (parseProtocolMessage(event.data)) {
          write(event.data);
        } else {
          logger.debug(`Skipping non-protocol stream event${event.id ? ` ${event.id}` : ''}`);
        }
      }
    } finally {
      result.cancel();
    }
    await result.done;
  };

  const deliver = async (result: RelayResult, payload: ProtocolPayload) => {
    switch (result.type) {
      case 'accepted':
        return;
      case 'reply':
        write(result.body);
        return;
      case 'stream':
        await pump(result);
        return;
      case 'passthrough': {
        const text = result.body ? await new Response(result.body).text() : '';
        const answer = parseProtocolPayload(text);
        if (answer) {
          writeMessage(answer);
          return;
        }
        failRequests(pendingRequestIds(payload), RelayErrorCodes.UPSTREAM_UNAVAILABLE, `Upstream answered with status ${result.status}`);
        return;
      }
    }
  };

  const listen = async (id: string) => {
    try {
      const result = await relay.openStream({ sessionId: id });
      if (result.type === 'stream') {
        listenCancel = result.cancel;
        if (closed) result.cancel();
        await pump(result);
        return;
      }
      if (result.type === 'passthrough') {
        await result.body?.cancel();
        logger.debug(`Upstream offers no server stream (status ${result.status})`);
      }
    } catch (err) {
      logger.debug(`Server stream unavailable: ${errorMessage(err)}`);
    }
  };

  const dispatch = async (payload: ProtocolPayload) => {
    let release: (() => void) | undefined;
    if (sessionId === undefined) {
      const previous = gate;
      gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      await previous;
    }

    let result: RelayResult;
    try {
      const input: HandleMessageInput = { payload, clientTransport: 'stdio' };
      if (sessionId !== undefined) input.sessionId = sessionId;
      result = await relay.handleMessage(input);
      if (sessionId === undefined) {
        sessionId = result.sessionId;
      }
    } catch (err) {
      failRequests(pendingRequestIds(payload), RelayErrorCodes.UPSTREAM_UNAVAILABLE, errorMessage(err));
      return;
    } finally {
      release?.();
    }

    // Upstreams only serve the session stream once initialization is done
    if (!listenTask && !closed && !opensSession(payload)) {
      listenTask = listen(result.sessionId);
    }
    await deliver(result, payload);
  };

  return {
    handleLine(line) {
      if (closed || line.trim() === '') return;

      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (err) {
        writeMessage(createErrorResponse(null, RelayErrorCodes.PARSE_ERROR, `Parse error: ${errorMessage(err)}`));
        return;
      }

      const parsed = ProtocolPayloadSchema.safeParse(raw);
      if (!parsed.success) {
        writeMessage(
          createErrorResponse(null, RelayErrorCodes.INVALID_REQUEST, 'Invalid Request: not a JSON-RPC message or batch')
        );
        return;
      }

      const payload = parsed.data;
      track(
        dispatch(payload).catch((err: unknown) => {
          logger.error(`Relaying client message failed: ${errorMessage(err)}`);
        })
      );
    },

    async drain() {
      while (inflight.size > 0) {
        await Promise.allSettled([...inflight]);
      }
      // The server stream never ends by itself while the upstream lives
      closed = true;
      listenCancel?.();
      await listenTask;
    },

    close() {
      closed = true;
      listenCancel?.();
    }
  };
}
