import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { buildApp } from '@/app';
import type { FastifyInstance } from 'fastify';
import { makeSettings } from '../../helpers/settings';

describe('GET /health', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = buildApp({ settings: makeSettings({ clientId: 'test-client-id', mockMode: false }) });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('returns ok: true with the PMS configuration summary', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/health',
    });

    expect(response.statusCode).toBe(200);

    const body = response.json<Record<string, unknown>>();
    expect(body).toMatchObject({
      ok: true,
      server: 'hotel-pms-mcp',
      version: '0.1.1',
      mockMode: false,
      credentialsConfigured: true,
      clientId: '...t-id',
    });
    expect(body.timestamp).toBeDefined();
  });

  it('never exposes the client secret', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });
    expect(response.body).not.toContain('test-secret');
  });
});
