import { describe, it, expect, vi } from 'vitest';
import { PmsHttpClient, backoffDelayMs } from '@/integrations/http/pms-http-client';
import {
  AuthConfigurationError,
  AuthenticationError,
  ServiceUnavailableError,
  UpstreamContractError,
  UpstreamRequestError,
} from '@/integrations/errors';
import type { PmsSettings } from '@/config/settings';
import { makeSettings } from '../../helpers/settings';
import { createStubTransport, withTokenEndpoint, type StubRoute } from '../../helpers/stub-transport';

function clientFor(route: StubRoute, overrides: Partial<PmsSettings> = {}) {
  const stub = createStubTransport(route);
  const sleep = vi.fn(async (_ms: number) => undefined);
  const client = new PmsHttpClient(makeSettings(overrides), {
    transportFactory: stub.factory,
    sleep,
  });
  return { stub, sleep, client };
}

describe('backoffDelayMs', () => {
  it('doubles from one second', () => {
    expect([0, 1, 2, 3].map(backoffDelayMs)).toEqual([1000, 2000, 4000, 8000]);
  });
});

describe('PmsHttpClient', () => {
  it('reuses one access token across requests', async () => {
    const { stub, client } = clientFor(withTokenEndpoint(() => ({ status: 200, data: { ok: true } })));

    await client.makeAuthenticatedRequest('GET', '/guests/G1');
    await client.makeAuthenticatedRequest('GET', '/rooms/R1');

    expect(stub.tokenRequests()).toHaveLength(1);
    expect(stub.apiRequests().map((r) => r.authorization)).toEqual(['Bearer token-1', 'Bearer token-1']);
    expect(stub.created).toBe(1);
  });

  it('exposes the cached access token', async () => {
    const { stub, client } = clientFor(withTokenEndpoint(() => ({ status: 200, data: {} })));

    expect(await client.getAccessToken()).toBe('token-1');
    await client.makeAuthenticatedRequest('GET', '/rooms');
    expect(await client.getAccessToken()).toBe('token-1');
    expect(stub.tokenRequests()).toHaveLength(1);
  });

  it('returns the sentinel token in mock mode', async () => {
    const { stub, client } = clientFor(() => ({ status: 500 }), { mockMode: true });

    expect(await client.getAccessToken()).toBe('mock-access-token');
    expect(stub.created).toBe(0);
  });

  it('sends query params and a JSON body', async () => {
    const { stub, client } = clientFor(withTokenEndpoint(() => ({ status: 200, data: { ok: true } })));

    await client.makeAuthenticatedRequest('POST', '/reservations/RES1/checkin', {
      params: { propertyId: 'PROP1' },
      body: { roomId: 'R7' },
    });

    const [request] = stub.apiRequests();
    expect(request).toMatchObject({
      method: 'POST',
      url: '/reservations/RES1/checkin',
      params: { propertyId: 'PROP1' },
      body: { roomId: 'R7' },
    });
  });

  it('returns the parsed body of a 2xx response', async () => {
    const { client } = clientFor(withTokenEndpoint(() => ({ status: 200, data: { guestId: 'G1' } })));

    expect(await client.makeAuthenticatedRequest('GET', '/guests/G1')).toEqual({
      found: true,
      data: { guestId: 'G1' },
    });
  });

  it('resolves a 404 to not-found without retrying', async () => {
    const { stub, sleep, client } = clientFor(withTokenEndpoint(() => ({ status: 404 })));

    expect(await client.makeAuthenticatedRequest('GET', '/guests/NOPE')).toEqual({ found: false });
    expect(stub.apiRequests()).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('refreshes the token once on a 401 and resends', async () => {
    const { stub, sleep, client } = clientFor(
      withTokenEndpoint((_request, index) => (index === 0 ? { status: 401 } : { status: 200, data: { ok: true } })),
    );

    const result = await client.makeAuthenticatedRequest('GET', '/rooms/R1');

    expect(result).toEqual({ found: true, data: { ok: true } });
    expect(stub.tokenRequests()).toHaveLength(2);
    expect(stub.apiRequests().map((r) => r.authorization)).toEqual(['Bearer token-1', 'Bearer token-2']);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries error statuses with exponential backoff and surfaces the message field', async () => {
    const { stub, sleep, client } = clientFor(
      withTokenEndpoint(() => ({ status: 500, data: { message: 'Internal failure' } })),
      { maxRetries: 3 },
    );

    const err = await client.makeAuthenticatedRequest('GET', '/rooms').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamRequestError);
    expect(err).toMatchObject({
      message: 'Internal failure',
      status: 500,
      details: { method: 'GET', endpoint: '/rooms', attempts: 3 },
    });
    expect(stub.apiRequests()).toHaveLength(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  it('recovers when a retry succeeds', async () => {
    const { sleep, client } = clientFor(
      withTokenEndpoint((_request, index) => (index === 0 ? { status: 503 } : { status: 200, data: { ok: true } })),
    );

    expect(await client.makeAuthenticatedRequest('GET', '/rooms')).toEqual({ found: true, data: { ok: true } });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000]);
  });

  it('makes a single attempt when maxRetries is 0 and uses the raw body as message', async () => {
    const { stub, sleep, client } = clientFor(
      withTokenEndpoint(() => ({ status: 502, data: 'Bad gateway' })),
      { maxRetries: 0 },
    );

    const err = await client.makeAuthenticatedRequest('GET', '/rooms').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamRequestError);
    expect(err).toMatchObject({ message: 'Bad gateway', status: 502 });
    expect(stub.apiRequests()).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('falls back to a generic message for an empty error body', async () => {
    const { client } = clientFor(withTokenEndpoint(() => ({ status: 500 })), { maxRetries: 1 });

    const err = await client.makeAuthenticatedRequest('GET', '/rooms').catch((e: unknown) => e);
    expect(err).toMatchObject({ message: 'Request failed with status 500', status: 500 });
  });

  it('maps a persistent transport failure to service unavailable', async () => {
    const { stub, sleep, client } = clientFor(
      withTokenEndpoint(() => ({ networkError: 'socket hang up' })),
      { maxRetries: 2 },
    );

    const err = await client.makeAuthenticatedRequest('GET', '/rooms').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ServiceUnavailableError);
    expect(err).toMatchObject({ message: 'Network error: ECONNREFUSED: socket hang up', status: 503 });
    expect(stub.apiRequests()).toHaveLength(2);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000]);
  });

  it('rejects an empty 2xx body as a contract violation', async () => {
    const { client } = clientFor(withTokenEndpoint(() => ({ status: 200, data: '' })));

    const err = await client.makeAuthenticatedRequest('GET', '/rooms').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamContractError);
    expect(err).toMatchObject({ message: 'PMS returned an empty or non-JSON response', status: 500 });
  });

  it('rejects a 2xx body that is not JSON', async () => {
    const { client } = clientFor(withTokenEndpoint(() => ({ status: 200, data: '<html>oops</html>' })));

    const err = await client.makeAuthenticatedRequest('GET', '/rooms').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamContractError);
    expect(err).toMatchObject({ message: 'PMS returned a response that is not valid JSON' });
  });

  it('does not retry token endpoint failures', async () => {
    const { stub, sleep, client } = clientFor(() => ({ status: 401 }));

    const err = await client.makeAuthenticatedRequest('GET', '/rooms').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AuthenticationError);
    expect(stub.tokenRequests()).toHaveLength(1);
    expect(stub.apiRequests()).toHaveLength(0);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('fails fast without credentials in real mode', async () => {
    const { stub, client } = clientFor(() => ({ status: 200 }), { clientId: '', clientSecret: '' });

    await expect(client.makeAuthenticatedRequest('GET', '/rooms')).rejects.toBeInstanceOf(AuthConfigurationError);
    expect(stub.requests).toHaveLength(0);
  });

  it('releases the transport on close and opens a new one on next use', async () => {
    const { stub, client } = clientFor(withTokenEndpoint(() => ({ status: 200, data: {} })));

    await client.makeAuthenticatedRequest('GET', '/rooms');
    client.close();
    client.close();
    expect(stub.closed).toBe(1);

    await client.makeAuthenticatedRequest('GET', '/rooms');
    expect(stub.created).toBe(2);
  });
});
