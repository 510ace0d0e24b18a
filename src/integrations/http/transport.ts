import http from 'http';
import https from 'https';
import axios, { type AxiosInstance } from 'axios';
import type { PmsSettings } from '../../config/settings';
import pkg from '../../../package.json';

/**
 * Pooled HTTP transport bound to one client's lifetime.
 * close() tears down the keep-alive sockets.
 */
export interface PmsTransport {
  readonly http: AxiosInstance;
  close(): void;
}

export type TransportFactory = (settings: PmsSettings) => PmsTransport;

export const createAxiosTransport: TransportFactory = (settings) => {
  const httpAgent = new http.Agent({ keepAlive: true });
  const httpsAgent = new https.Agent({ keepAlive: true });

  const instance = axios.create({
    baseURL: settings.baseUrl,
    timeout: settings.timeoutSeconds * 1000,
    headers: {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      'User-Agent': `${pkg.name}/${pkg.version}`,
    },
    httpAgent,
    httpsAgent,
    // Status handling (401 refresh, 404, retries) is done by the caller.
    validateStatus: () => true,
  });

  return {
    http: instance,
    close(): void {
      httpAgent.destroy();
      httpsAgent.destroy();
    },
  };
};
