/**
 * Local health probe shared by the `health` command and GET /health.
 * Does not contact the Porkbun API.
 */

import type { Settings } from './types.js';
import { hasCredentials, maskApiKey } from './config.js';
import { SERVER_NAME, SERVER_VERSION } from './version.js';

export interface HealthSnapshot {
  server_name: string;
  status: 'healthy';
  version: string;
  credentials_configured: boolean;
  api_url: string;
  api_key: string;
}

export function healthSnapshot(settings: Settings): HealthSnapshot {
  return {
    server_name: SERVER_NAME,
    status: 'healthy',
    version: SERVER_VERSION,
    credentials_configured: hasCredentials(settings),
    api_url: settings.baseUrl,
    api_key: maskApiKey(settings.apiKey),
  };
}
