/**
 * Configuration loader for Porkbun Domain MCP.
 *
 * Layers, later overrides earlier:
 * 1. Field defaults
 * 2. settings/porkbun-domain.json (committed deployment defaults)
 * 3. settings/local.json (gitignored, for development)
 * 4. Environment variables PORKBUN_DOMAIN_{FIELD} (a .env file is read first)
 *
 * Settings are loaded once by the entry point and passed down.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';
import type { Settings } from './types.js';
import { ConfigurationError } from './utils/errors.js';

export const DEFAULT_BASE_URL = 'https://api.porkbun.com/api/json/v3';
export const ENV_PREFIX = 'PORKBUN_DOMAIN_';
export const DEPLOYMENT_SETTINGS_FILE = 'porkbun-domain.json';
export const LOCAL_SETTINGS_FILE = 'local.json';

// ═══════════════════════════════════════════════════════════════════════════
// Schema
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Environment values arrive as strings; file values arrive typed.
 */
const booleanish = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  return normalized === 'true' || normalized === '1' || normalized === 'yes';
}, z.boolean());

function numberish<T extends z.ZodNumber>(schema: T) {
  return z.preprocess(
    (value) =>
      typeof value === 'string' && value.trim() !== '' ? Number(value) : value,
    schema,
  );
}

const listish = z.preprocess(
  (value) =>
    typeof value === 'string'
      ? value
          .split(',')
          .map((s) => s.trim())
          .filter((s) => s.length > 0)
      : value,
  z.array(z.string()).min(1),
);

const logLevel = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  return normalized === 'warning' ? 'warn' : normalized;
}, z.enum(['debug', 'info', 'warn', 'error']));

const baseUrl = z
  .string()
  .transform((value) => {
    const trimmed = value.trim();
    return trimmed === '' ? DEFAULT_BASE_URL : trimmed.replace(/\/+$/, '');
  })
  .pipe(z.string().url());

export const settingsSchema = z.object({
  apiKey: z.string().default(''),
  secretKey: z.string().default(''),
  baseUrl: baseUrl.default(DEFAULT_BASE_URL),
  timeout: numberish(z.number().min(1).max(120)).default(30),
  maxRetries: numberish(z.number().int().min(0).max(5)).default(3),
  enableHttpTransport: booleanish.default(false),
  httpHost: z.string().min(1).default('127.0.0.1'),
  httpPort: numberish(z.number().int().min(1).max(65535)).default(3043),
  corsOrigins: listish.default(['*']),
  logLevel: logLevel.default('info'),
  logJson: booleanish.default(true),
  outputFormat: z.enum(['table', 'json', 'both']).default('json'),
});

/**
 * Environment variable suffix for each field.
 */
const ENV_KEYS: Record<keyof Settings, string> = {
  apiKey: 'API_KEY',
  secretKey: 'SECRET_KEY',
  baseUrl: 'BASE_URL',
  timeout: 'TIMEOUT',
  maxRetries: 'MAX_RETRIES',
  enableHttpTransport: 'ENABLE_HTTP_TRANSPORT',
  httpHost: 'HTTP_HOST',
  httpPort: 'HTTP_PORT',
  corsOrigins: 'CORS_ORIGINS',
  logLevel: 'LOG_LEVEL',
  logJson: 'LOG_JSON',
  outputFormat: 'OUTPUT_FORMAT',
};

// ═══════════════════════════════════════════════════════════════════════════
// Layers
// ═══════════════════════════════════════════════════════════════════════════

type RawLayer = Record<string, unknown>;

function isRecord(value: unknown): value is RawLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a JSON settings file. A missing file is an empty layer.
 */
function readFileLayer(path: string): RawLayer {
  if (!existsSync(path)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `${path} is not valid JSON (${error instanceof Error ? error.message : String(error)})`,
      `Fix or remove ${path}.`,
    );
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(
      `${path} must contain a JSON object`,
      `Fix or remove ${path}.`,
    );
  }
  return parsed;
}

function readDotenv(path: string): Record<string, string> {
  if (!existsSync(path)) return {};
  return parseDotenv(readFileSync(path));
}

function readEnvLayer(env: NodeJS.ProcessEnv): RawLayer {
  const layer: RawLayer = {};
  for (const [field, suffix] of Object.entries(ENV_KEYS)) {
    const value = env[`${ENV_PREFIX}${suffix}`];
    if (value !== undefined) {
      layer[field] = value;
    }
  }
  return layer;
}

export interface LoadSettingsOptions {
  /** Directory holding .env; defaults to process.cwd() */
  cwd?: string;
  /** Directory holding the JSON layers; defaults to <cwd>/settings */
  settingsDir?: string;
  /** Environment to read; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Skip reading .env */
  skipDotenv?: boolean;
}

/**
 * Load and validate settings from all layers.
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const cwd = options.cwd ?? process.cwd();
  const settingsDir = options.settingsDir ?? join(cwd, 'settings');

  // Real environment variables win over .env entries
  const env: NodeJS.ProcessEnv = {
    ...(options.skipDotenv ? {} : readDotenv(join(cwd, '.env'))),
    ...(options.env ?? process.env),
  };

  const merged: RawLayer = {
    ...readFileLayer(join(settingsDir, DEPLOYMENT_SETTINGS_FILE)),
    ...readFileLayer(join(settingsDir, LOCAL_SETTINGS_FILE)),
    ...readEnvLayer(env),
  };

  const result = settingsSchema.safeParse(merged);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(
      problems,
      `Check ${ENV_PREFIX}* environment variables and the files in ${settingsDir}.`,
    );
  }

  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Check if API credentials are configured.
 */
export function hasCredentials(settings: Settings): boolean {
  return settings.apiKey.length > 0 && settings.secretKey.length > 0;
}

/**
 * Masked API key for safe logging.
 */
export function maskApiKey(apiKey: string): string {
  if (apiKey.length <= 4) return '***';
  return `...${apiKey.slice(-4)}`;
}

/**
 * Authentication fields Porkbun expects in every request body.
 */
export function authPayload(settings: Settings): { apikey: string; secretapikey: string } {
  return {
    apikey: settings.apiKey,
    secretapikey: settings.secretKey,
  };
}
