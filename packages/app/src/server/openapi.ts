import { createRoute } from '@hono/zod-openapi';
import { HealthResponseSchema } from './schemas';

// ============================================================================
// Route Definitions
// ============================================================================

// Health check
export const healthRoute = createRoute({
  method: 'get',
  path: '/health',
  tags: ['System'],
  summary: 'Health check',
  description: 'Check if the relay is running and how many sessions it holds',
  responses: {
    200: {
      content: { 'application/json': { schema: HealthResponseSchema } },
      description: 'Relay is healthy'
    }
  }
});
