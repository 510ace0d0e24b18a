import type { AxiosInstance, AxiosResponse, Method } from 'axios';
import { logger } from '../../config/logger';
import type { PmsSettings } from '../../config/settings';
import type { Lookup } from '../../types/common';
import {
  PmsApiError,
  ServiceUnavailableError,
  UpstreamContractError,
  UpstreamRequestError,
} from '../errors';
import { AccessTokenProvider } from './access-token';
import { describeError, extractErrorMessage, isSuccessStatus } from './response';
import { createAxiosTransport, type PmsTransport, type TransportFactory } from './transport';

export interface RequestOptions {
  params?: Record<string, string>;
  body?: Record<string, unknown>;
}

export interface PmsHttpClientOptions {
  transportFactory?: TransportFactory;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/** 1s, 2s, 4s, ... after attempt 0, 1, 2, ... */
export function backoffDelayMs(attempt: number): number {
  return 2 ** attempt * 1000;
}

/**
 * Authenticated request dispatcher for the PMS REST API.
 *
 * Owns the pooled transport (created on first use) and the access-token cache.
 * A 401 triggers one token refresh and one resend without using a retry slot;
 * a 404 resolves to { found: false }; any other non-2xx or transport failure is
 * retried with exponential backoff up to settings.maxRetries attempts.
 */
export class PmsHttpClient {
  private transport: PmsTransport | null = null;
  private readonly tokens: AccessTokenProvider;
  private readonly transportFactory: TransportFactory;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly settings: PmsSettings,
    options: PmsHttpClientOptions = {},
  ) {
    this.transportFactory = options.transportFactory ?? createAxiosTransport;
    this.sleep = options.sleep ?? defaultSleep;
    this.tokens = new AccessTokenProvider(settings, () => this.http());
  }

  getAccessToken(): Promise<string> {
    return this.tokens.getAccessToken();
  }

  async makeAuthenticatedRequest(
    method: Method,
    endpoint: string,
    options: RequestOptions = {},
  ): Promise<Lookup<unknown>> {
    // maxRetries=0 still makes the one request the caller asked for.
    const attempts = Math.max(1, this.settings.maxRetries);

    for (let attempt = 0; attempt < attempts; attempt++) {
      const isLastAttempt = attempt === attempts - 1;

      let response: AxiosResponse<unknown>;
      try {
        response = await this.sendWithTokenRefresh(method, endpoint, options);
      } catch (err) {
        // Token-endpoint failures are already typed and are not retried here.
        if (err instanceof PmsApiError) throw err;

        if (isLastAttempt) {
          throw new ServiceUnavailableError(`Network error: ${describeError(err)}`, {
            method,
            endpoint,
            attempts,
          });
        }

        logger.warn(
          { method, endpoint, attempt: attempt + 1, attempts, err: describeError(err) },
          'PMS request failed, retrying',
        );
        await this.sleep(backoffDelayMs(attempt));
        continue;
      }

      if (response.status === 404) {
        logger.debug({ method, endpoint }, 'PMS resource not found');
        return { found: false };
      }

      if (isSuccessStatus(response.status)) {
        return { found: true, data: this.parseBody(response, endpoint) };
      }

      if (isLastAttempt) {
        throw new UpstreamRequestError(
          extractErrorMessage(response.data, response.status),
          response.status,
          { method, endpoint, attempts },
        );
      }

      logger.warn(
        { method, endpoint, status: response.status, attempt: attempt + 1, attempts },
        'PMS request returned an error status, retrying',
      );
      await this.sleep(backoffDelayMs(attempt));
    }

    throw new ServiceUnavailableError('Max retries exceeded', { method, endpoint });
  }

  close(): void {
    if (this.transport !== null) {
      this.transport.close();
      this.transport = null;
      logger.debug('PMS transport closed');
    }
  }

  private http(): AxiosInstance {
    if (this.transport === null) {
      this.transport = this.transportFactory(this.settings);
    }
    return this.transport.http;
  }

  private async sendWithTokenRefresh(
    method: Method,
    endpoint: string,
    options: RequestOptions,
  ): Promise<AxiosResponse<unknown>> {
    const token = await this.tokens.getAccessToken();
    const response = await this.send(method, endpoint, options, token);
    if (response.status !== 401) return response;

    logger.info({ method, endpoint }, 'Access token rejected, refreshing');
    this.tokens.invalidate();
    const fresh = await this.tokens.getAccessToken();
    return this.send(method, endpoint, options, fresh);
  }

  private send(
    method: Method,
    endpoint: string,
    options: RequestOptions,
    token: string,
  ): Promise<AxiosResponse<unknown>> {
    return this.http().request<unknown>({
      method,
      url: endpoint,
      params: options.params,
      data: options.body,
      headers: { Authorization: `Bearer ${token}` },
    });
  }

  private parseBody(response: AxiosResponse<unknown>, endpoint: string): unknown {
    const { data } = response;
    if (typeof data === 'object' && data !== null) return data;

    if (typeof data === 'string' && data.trim() !== '') {
      try {
        return JSON.parse(data);
      } catch (err) {
        throw new UpstreamContractError('PMS returned a response that is not valid JSON', {
          endpoint,
          status: response.status,
          reason: describeError(err),
        });
      }
    }

    throw new UpstreamContractError('PMS returned an empty or non-JSON response', {
      endpoint,
      status: response.status,
    });
  }
}
