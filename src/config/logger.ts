import pino from 'pino';
import { env } from './env';

const options: pino.LoggerOptions = {
  name: 'hotel-pms-mcp',
  level: env.LOG_LEVEL,
};

// stdout belongs to the MCP stdio transport, so logs always go to stderr.
export const logger: pino.Logger =
  env.LOG_FORMAT === 'pretty'
    ? pino({
        ...options,
        transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
      })
    : pino(options, pino.destination(2));
