import type { FastifyInstance } from 'fastify';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { buildApp } from '../app';
import { logger } from '../config/logger';
import type { PmsSettings, ServerSettings } from '../config/settings';
import { maskClientId } from '../config/settings';
import { PmsClient } from '../services/pms-client.service';
import { createMcpServer } from './server';

/** Serves the PMS tools over stdin/stdout. The client lives as long as the server. */
export async function startStdioServer(settings: PmsSettings): Promise<Server> {
  const client = new PmsClient(settings);
  const server = createMcpServer(client, { closeClientOnShutdown: true });

  await server.connect(new StdioServerTransport());
  logger.info(
    { mockMode: settings.mockMode, clientId: maskClientId(settings) },
    'MCP server listening on stdio',
  );
  return server;
}

/** Serves /mcp, /health and /version over HTTP. Closing the app closes the client. */
export async function startHttpServer(
  settings: PmsSettings,
  server: ServerSettings,
): Promise<FastifyInstance> {
  const client = new PmsClient(settings);
  const app = buildApp({ settings, client });

  await app.listen({ host: server.httpHost, port: server.httpPort });
  logger.info(
    { host: server.httpHost, port: server.httpPort, mockMode: settings.mockMode },
    'MCP server listening on HTTP',
  );
  return app;
}
