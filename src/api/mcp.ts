import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { createMcpServer } from '../mcp/server';
import type { PmsClient } from '../services/pms-client.service';

/**
 * POST /mcp — MCP over Streamable HTTP, stateless.
 * Each request gets its own protocol server; all of them share one PMS client.
 */
export function mcpRoutes(client: PmsClient) {
  return async (app: FastifyInstance): Promise<void> => {
    app.post('/mcp', async (request, reply) => {
      const server = createMcpServer(client);
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableJsonResponse: true,
      });

      reply.raw.on('close', () => {
        transport.close().catch((err: unknown) => request.log.warn({ err }, 'MCP transport close failed'));
        server.close().catch((err: unknown) => request.log.warn({ err }, 'MCP server close failed'));
      });

      reply.hijack();
      await server.connect(transport);
      await transport.handleRequest(request.raw, reply.raw, request.body);
    });

    // Stateless mode has no sessions to stream to or terminate.
    const methodNotAllowed = async (_request: FastifyRequest, reply: FastifyReply) =>
      reply.code(405).send({
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Method not allowed.' },
        id: null,
      });
    app.get('/mcp', methodNotAllowed);
    app.delete('/mcp', methodNotAllowed);
  };
}
