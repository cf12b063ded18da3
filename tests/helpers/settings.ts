import type { Settings } from '../../src/types';

/**
 * Settings for tests: placeholder credentials, no file or env layers.
 */
export function testSettings(overrides: Partial<Settings> = {}): Settings {
  return {
    apiKey: 'test-key',
    secretKey: 'test-secret',
    baseUrl: 'https://api.porkbun.test/api/json/v3',
    timeout: 5,
    maxRetries: 3,
    enableHttpTransport: false,
    httpHost: '127.0.0.1',
    httpPort: 3043,
    corsOrigins: ['*'],
    logLevel: 'error',
    logJson: true,
    outputFormat: 'json',
    ...overrides,
  };
}
