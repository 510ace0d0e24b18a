import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { v4 as uuid } from 'uuid';

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
  }
}

/**
 * Fastify plugin: attaches a request_id to every request (honouring an
 * incoming x-request-id), echoes it back, and logs structured
 * api.request.start / api.request.end lines with route, status and duration.
 */
async function requestContextPlugin(app: FastifyInstance): Promise<void> {
  app.decorateRequest('requestId', '');

  app.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    const incoming = request.headers['x-request-id'];
    request.requestId = typeof incoming === 'string' && incoming !== '' ? incoming : uuid();
    void reply.header('x-request-id', request.requestId);
  });

  app.addHook('preHandler', async (request: FastifyRequest) => {
    request.log.info(
      {
        requestId: request.requestId,
        route: request.routeOptions?.url ?? request.url,
        method: request.method,
      },
      'api.request.start',
    );
  });

  app.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    request.log.info(
      {
        requestId: request.requestId,
        route: request.routeOptions?.url ?? request.url,
        method: request.method,
        statusCode: reply.statusCode,
        durationMs: Math.round(reply.elapsedTime),
      },
      'api.request.end',
    );
  });
}

export default fp(requestContextPlugin, {
  name: 'request-context',
});
