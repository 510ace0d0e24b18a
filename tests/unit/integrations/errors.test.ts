import { describe, it, expect } from 'vitest';
import {
  AuthConfigurationError,
  PmsApiError,
  ServiceUnavailableError,
  UpstreamRequestError,
  isPmsApiError,
} from '@/integrations/errors';

describe('PmsApiError', () => {
  it('keeps subclass identity and the base type', () => {
    const err = new ServiceUnavailableError('Max retries exceeded');
    expect(err).toBeInstanceOf(ServiceUnavailableError);
    expect(err).toBeInstanceOf(PmsApiError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ServiceUnavailableError');
    expect(err.status).toBe(503);
    expect(isPmsApiError(err)).toBe(true);
  });

  it('serializes details only when present', () => {
    expect(new AuthConfigurationError().toJSON()).toEqual({
      error: 'PMS client credentials are not configured',
      status: 401,
    });
    expect(new UpstreamRequestError('Conflict', 409, { endpoint: '/rooms' }).toJSON()).toEqual({
      error: 'Conflict',
      status: 409,
      details: { endpoint: '/rooms' },
    });
  });

  it('does not treat plain errors as PMS errors', () => {
    expect(isPmsApiError(new Error('boom'))).toBe(false);
    expect(isPmsApiError('boom')).toBe(false);
  });
});
