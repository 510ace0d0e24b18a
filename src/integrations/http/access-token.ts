import type { AxiosInstance, AxiosResponse } from 'axios';
import { logger } from '../../config/logger';
import { hasCredentials, maskClientId, type PmsSettings } from '../../config/settings';
import {
  AuthConfigurationError,
  AuthenticationError,
  ServiceUnavailableError,
  UpstreamContractError,
} from '../errors';
import { tokenResponseSchema } from '../validation';
import { bodyText, describeError, isSuccessStatus } from './response';

export const MOCK_ACCESS_TOKEN = 'mock-access-token';
export const TOKEN_SCOPE = 'pms.read pms.write';

/** https://api.example.com/pms/v1 -> https://api.example.com/pms/oauth/token */
export function deriveTokenUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/v\d+$/, '')}/oauth/token`;
}

/**
 * OAuth2 client-credentials token cache.
 *
 * There is no expiry tracking: a cached token is trusted until a request
 * made with it comes back 401 and the dispatcher calls invalidate().
 * Concurrent refreshes are tolerated; the last one to finish wins.
 */
export class AccessTokenProvider {
  private token: string | null = null;

  constructor(
    private readonly settings: PmsSettings,
    private readonly http: () => AxiosInstance,
  ) {}

  async getAccessToken(): Promise<string> {
    if (this.token !== null) return this.token;

    if (this.settings.mockMode) return MOCK_ACCESS_TOKEN;

    if (!hasCredentials(this.settings)) {
      throw new AuthConfigurationError(
        'PMS client credentials are not configured. Set PMS_CLIENT_ID and PMS_CLIENT_SECRET, or enable PMS_MOCK_MODE.',
      );
    }

    const token = await this.exchange();
    this.token = token;
    return token;
  }

  invalidate(): void {
    this.token = null;
  }

  private async exchange(): Promise<string> {
    const tokenUrl = deriveTokenUrl(this.settings.baseUrl);
    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.settings.clientId,
      client_secret: this.settings.clientSecret,
      scope: TOKEN_SCOPE,
    });

    logger.debug({ tokenUrl, clientId: maskClientId(this.settings) }, 'Requesting access token');

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http().post<unknown>(tokenUrl, form.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      });
    } catch (err) {
      throw new ServiceUnavailableError(`Token request failed: ${describeError(err)}`, { tokenUrl });
    }

    if (response.status === 401) {
      throw new AuthenticationError('Authentication failed: invalid client credentials', 401);
    }

    if (!isSuccessStatus(response.status)) {
      const body = bodyText(response.data);
      throw new AuthenticationError(
        `Token request failed with status ${response.status}: ${body}`,
        response.status,
        { body },
      );
    }

    const parsed = tokenResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new UpstreamContractError('Token response did not include an access_token', {
        issues: parsed.error.issues,
      });
    }

    logger.info({ clientId: maskClientId(this.settings) }, 'Access token acquired');
    return parsed.data.access_token;
  }
}
