import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { logger } from '../config/logger';
import type { PmsClient } from '../services/pms-client.service';
import { buildPmsTools, type ToolResponse } from '../tools/pms-tools';
import pkg from '../../package.json';

export const SERVER_NAME = 'hotel-pms-mcp';
export const SERVER_VERSION = pkg.version;

function toCallToolResult(response: ToolResponse) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(response, null, 2) }],
    isError: response.error !== undefined,
  };
}

/**
 * Creates an MCP server exposing the PMS tools. The caller owns the client;
 * closeClientOnShutdown ties its lifetime to the server's.
 */
export function createMcpServer(
  client: PmsClient,
  options: { closeClientOnShutdown?: boolean } = {},
): Server {
  const tools = buildPmsTools(client);
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: tools.map(({ name, description, inputSchema }) => ({ name, description, inputSchema })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const tool = tools.find((t) => t.name === name);
    if (!tool) {
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }

    logger.info({ tool: name }, 'Tool called');
    try {
      return toCallToolResult(await tool.handler(args));
    } catch (err) {
      if (err instanceof ZodError) {
        const detail = err.issues.map((i) => `${i.path.join('.') || 'arguments'}: ${i.message}`);
        throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for ${name}: ${detail.join('; ')}`);
      }
      throw err;
    }
  });

  if (options.closeClientOnShutdown) {
    server.onclose = () => {
      client.close();
      logger.info('MCP server closed');
    };
  }

  logger.debug({ tools: tools.length, backend: client.backendName }, 'Registered PMS tools');
  return server;
}
