import fastify, { type FastifyInstance } from 'fastify';
import { env } from './config/env';
import { buildPmsSettings, type PmsSettings } from './config/settings';
import requestContextPlugin from './api/middleware/request-context';
import { healthRoutes } from './api/health';
import { versionRoutes } from './api/version';
import { mcpRoutes } from './api/mcp';
import type { PmsClient } from './services/pms-client.service';

export interface BuildAppOptions {
  settings?: PmsSettings;
  /** When given, POST /mcp serves the PMS tools and the client is closed with the app. */
  client?: PmsClient;
}

/**
 * Creates and configures the Fastify application.
 * Exported as a factory so tests can create isolated instances.
 */
export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const settings = options.settings ?? buildPmsSettings();

  const app = fastify({
    logger: {
      level: env.LOG_LEVEL,
      transport:
        env.LOG_FORMAT === 'pretty'
          ? { target: 'pino-pretty', options: { colorize: true } }
          : undefined,
    },
  });

  // Middleware: request_id + structured logging on all routes
  void app.register(requestContextPlugin);

  void app.register(healthRoutes(settings));
  void app.register(versionRoutes);

  const { client } = options;
  if (client) {
    void app.register(mcpRoutes(client));
    app.addHook('onClose', async () => {
      client.close();
    });
  }

  return app;
}
