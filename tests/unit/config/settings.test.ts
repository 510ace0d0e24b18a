import os from 'os';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { DEFAULT_BASE_URL, parseEnv } from '@/config/env';
import {
  buildPmsSettings,
  buildServerSettings,
  hasCredentials,
  maskClientId,
  normalizeBaseUrl,
} from '@/config/settings';
import { makeSettings } from '../../helpers/settings';

describe('parseEnv', () => {
  it('applies defaults for an empty environment', () => {
    const env = parseEnv({});
    expect(env.PMS_BASE_URL).toBe(DEFAULT_BASE_URL);
    expect(env.PMS_TIMEOUT_SECONDS).toBe(30);
    expect(env.PMS_MAX_RETRIES).toBe(3);
    expect(env.PMS_MOCK_MODE).toBe(false);
    expect(env.PMS_ENABLE_HTTP_TRANSPORT).toBe(false);
    expect(env.HTTP_HOST).toBe('127.0.0.1');
    expect(env.HTTP_PORT).toBe(3047);
    expect(env.LOG_FORMAT).toBe('json');
  });

  it.each(['true', 'TRUE', '1', 'yes', 'on', ' On '])('reads %j as an enabled flag', (value) => {
    expect(parseEnv({ PMS_MOCK_MODE: value }).PMS_MOCK_MODE).toBe(true);
  });

  it.each(['false', '0', 'no', ''])('reads %j as a disabled flag', (value) => {
    expect(parseEnv({ PMS_MOCK_MODE: value }).PMS_MOCK_MODE).toBe(false);
  });

  it('coerces numeric settings', () => {
    const env = parseEnv({ PMS_TIMEOUT_SECONDS: '12.5', PMS_MAX_RETRIES: '0', HTTP_PORT: '8080' });
    expect(env.PMS_TIMEOUT_SECONDS).toBe(12.5);
    expect(env.PMS_MAX_RETRIES).toBe(0);
    expect(env.HTTP_PORT).toBe(8080);
  });

  it('rejects out-of-range retries and timeouts', () => {
    expect(() => parseEnv({ PMS_MAX_RETRIES: '9' })).toThrow();
    expect(() => parseEnv({ PMS_TIMEOUT_SECONDS: '0' })).toThrow();
    expect(() => parseEnv({ PMS_TIMEOUT_SECONDS: '121' })).toThrow();
  });
});

describe('normalizeBaseUrl', () => {
  it('strips trailing slashes', () => {
    expect(normalizeBaseUrl('https://pms.test/api/v1///')).toBe('https://pms.test/api/v1');
  });

  it('falls back to the default for a blank value', () => {
    expect(normalizeBaseUrl('   ')).toBe(DEFAULT_BASE_URL);
  });
});

describe('buildPmsSettings', () => {
  it('maps env vars onto frozen settings', () => {
    const settings = buildPmsSettings(
      parseEnv({
        PMS_CLIENT_ID: 'test-client-id',
        PMS_CLIENT_SECRET: 'test-secret',
        PMS_BASE_URL: 'https://pms.test/api/v2/',
        PMS_PROPERTY_ID: 'PROP9',
        PMS_MOCK_MODE: 'yes',
      }),
    );

    expect(settings).toEqual({
      clientId: 'test-client-id',
      clientSecret: 'test-secret',
      baseUrl: 'https://pms.test/api/v2',
      propertyId: 'PROP9',
      timeoutSeconds: 30,
      maxRetries: 3,
      mockMode: true,
    });
    expect(Object.isFrozen(settings)).toBe(true);
  });

  it('builds server settings from the HTTP variables', () => {
    const server = buildServerSettings(
      parseEnv({
        PMS_ENABLE_HTTP_TRANSPORT: 'true',
        HTTP_HOST: '0.0.0.0',
        HTTP_PORT: '9000',
        PMS_PID_FILE: '/var/run/pms.pid',
      }),
    );
    expect(server).toEqual({
      enableHttpTransport: true,
      httpHost: '0.0.0.0',
      httpPort: 9000,
      pidFile: '/var/run/pms.pid',
    });
  });

  it('keeps the pid file in the temp directory by default', () => {
    expect(buildServerSettings(parseEnv({})).pidFile).toBe(path.join(os.tmpdir(), 'hotel-pms-mcp.pid'));
  });
});

describe('credentials', () => {
  it('requires both client id and secret', () => {
    expect(hasCredentials(makeSettings())).toBe(true);
    expect(hasCredentials(makeSettings({ clientSecret: '' }))).toBe(false);
    expect(hasCredentials(makeSettings({ clientId: '' }))).toBe(false);
  });

  it('masks all but the last four characters of the client id', () => {
    expect(maskClientId(makeSettings({ clientId: 'test-client-id' }))).toBe('...t-id');
    expect(maskClientId(makeSettings({ clientId: 'abcd' }))).toBe('***');
    expect(maskClientId(makeSettings({ clientId: '' }))).toBe('***');
  });
});
