import type { FastifyInstance } from 'fastify';
import type { PmsSettings } from '../config/settings';
import { buildHealthSnapshot } from '../services/health.service';

/**
 * GET /health — liveness probe with the PMS configuration summary.
 * No authentication required.
 */
export function healthRoutes(settings: PmsSettings) {
  return async (app: FastifyInstance): Promise<void> => {
    app.get('/health', async (_request, reply) => {
      return reply.send(buildHealthSnapshot(settings));
    });
  };
}
