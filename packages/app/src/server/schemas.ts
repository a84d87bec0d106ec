import { z } from 'zod';

// ============================================================================
// Health Endpoint Schemas
// ============================================================================

export const HealthResponseSchema = z.object({
  healthy: z.literal(true),
  version: z.string(),
  /** Sessions currently held by the store */
  sessions: z.number().int().nonnegative()
});

// ============================================================================
// Error Schemas
// ============================================================================

export const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional()
  })
});

export type HealthResponse = z.infer<typeof HealthResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
