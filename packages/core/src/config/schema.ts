import { z } from 'zod';

// ============================================================================
// Input schema (what may appear in mcp-relay.jsonc)
// ============================================================================

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

export const HttpUpstreamSchema = z
  .object({
    name: z.string().min(1),
    transport: z.literal('http'),
    url: z.string().url(),
    headers: z.record(z.string(), z.string()).optional()
  })
  .strict();

export const StdioUpstreamSchema = z
  .object({
    name: z.string().min(1),
    transport: z.literal('stdio'),
    command: z.array(z.string().min(1)).min(1),
    env: z.record(z.string(), z.string()).optional(),
    cwd: z.string().min(1).optional()
  })
  .strict();

export const UpstreamSchema = z.discriminatedUnion('transport', [HttpUpstreamSchema, StdioUpstreamSchema]);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const RelayConfigSchema = z
  .object({
    $schema: z.string().optional(),
    server: z
      .object({
        host: z.string().min(1),
        port: z.number().int().min(0).max(65535),
        path: z.string().startsWith('/')
      })
      .partial()
      .strict()
      .optional(),
    upstreams: z.array(UpstreamSchema).optional(),
    defaultUpstream: z.string().min(1).optional(),
    streaming: z
      .object({
        channelCapacity: positiveInt,
        dedupCapacity: positiveInt,
        idleTimeoutMs: nonNegativeInt,
        terminationEvents: z.array(z.string().min(1))
      })
      .partial()
      .strict()
      .optional(),
    reconnect: z
      .object({
        maxAttempts: positiveInt,
        initialDelayMs: nonNegativeInt,
        maxDelayMs: nonNegativeInt,
        multiplier: z.number().min(1),
        jitter: z.number().min(0).max(1)
      })
      .partial()
      .strict()
      .optional(),
    replies: z
      .object({ maxReplyBytes: positiveInt })
      .partial()
      .strict()
      .optional(),
    interceptors: z
      .object({
        timeoutMs: positiveInt,
        blockMethods: z.array(z.string().min(1))
      })
      .partial()
      .strict()
      .optional(),
    sessions: z
      .object({
        idleTtlMs: positiveInt,
        sweepIntervalMs: positiveInt,
        maxHistoryEntries: positiveInt
      })
      .partial()
      .strict()
      .optional(),
    shutdown: z
      .object({ drainGraceMs: nonNegativeInt })
      .partial()
      .strict()
      .optional(),
    logging: z
      .object({ level: LogLevelSchema })
      .partial()
      .strict()
      .optional()
  })
  .strict();
