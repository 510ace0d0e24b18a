import { hasCredentials, maskClientId, type PmsSettings } from '../config/settings';
import pkg from '../../package.json';

export interface HealthSnapshot {
  ok: boolean;
  timestamp: string;
  server: string;
  version: string;
  mockMode: boolean;
  credentialsConfigured: boolean;
  clientId: string;
}

/**
 * Liveness snapshot shared by GET /health and the `health` CLI command.
 * Never contacts the PMS; only reports local configuration.
 */
export function buildHealthSnapshot(settings: PmsSettings): HealthSnapshot {
  return {
    ok: true,
    timestamp: new Date().toISOString(),
    server: pkg.name,
    version: pkg.version,
    mockMode: settings.mockMode,
    credentialsConfigured: hasCredentials(settings),
    clientId: maskClientId(settings),
  };
}
