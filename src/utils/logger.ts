/**
 * Structured Logger with Secret Masking.
 *
 * - Outputs JSON (or plain lines) on stderr; stdout belongs to MCP stdio
 * - Masks API keys, secrets and auth codes automatically
 * - Includes request IDs for tracing concurrent tool calls
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { LogLevel } from '../types.js';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  request_id?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  /** JSON lines when true, human-readable lines otherwise */
  json: boolean;
}

/**
 * Patterns that look like API keys or secrets.
 * These will be masked in log output.
 */
const SECRET_PATTERNS = [
  // Porkbun keys: pk1_/sk1_ followed by a long hex string
  /\b[ps]k1_[a-f0-9]{16,}\b/gi,
  // Long alphanumeric strings (likely API keys)
  /\b[a-zA-Z0-9]{32,}\b/g,
  // Patterns that look like secrets
  /(?:api[_-]?key|secret|password|token|auth[_-]?code)[\s:="']+[^\s"']+/gi,
];

const SECRET_KEY_FRAGMENTS = [
  'secret',
  'password',
  'apikey',
  'api_key',
  'token',
  'authcode',
  'auth_code',
];

/**
 * Mask sensitive data in a value.
 */
export function maskSecrets(value: unknown): unknown {
  if (typeof value === 'string') {
    let masked = value;
    for (const pattern of SECRET_PATTERNS) {
      masked = masked.replace(pattern, '[REDACTED]');
    }
    return masked;
  }

  if (Array.isArray(value)) {
    return value.map(maskSecrets);
  }

  if (value && typeof value === 'object') {
    const maskedObj: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      const lowerKey = key.toLowerCase();
      if (SECRET_KEY_FRAGMENTS.some((fragment) => lowerKey.includes(fragment))) {
        maskedObj[key] = '[REDACTED]';
      } else {
        maskedObj[key] = maskSecrets(val);
      }
    }
    return maskedObj;
  }

  return value;
}

/**
 * Log level priority for filtering.
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let options: LoggerOptions = { level: 'info', json: true };

/**
 * Set level and output format. Called once at startup.
 */
export function configureLogger(next: LoggerOptions): void {
  options = { ...next };
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[options.level];
}

/**
 * Generate a unique request ID.
 */
export function generateRequestId(): string {
  return `req_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
}

const requestContext = new AsyncLocalStorage<string>();

/**
 * Run fn with a request ID attached to every log line it emits,
 * including lines from concurrent calls awaiting inside it.
 */
export function withRequestId<T>(requestId: string, fn: () => Promise<T>): Promise<T> {
  return requestContext.run(requestId, fn);
}

export function currentRequestId(): string | undefined {
  return requestContext.getStore();
}

/**
 * Render one entry as a line.
 */
export function formatEntry(entry: LogEntry, json: boolean): string {
  if (json) {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, ...rest } = entry;
  const extras = Object.entries(rest)
    .map(([key, val]) => `${key}=${typeof val === 'string' ? val : JSON.stringify(val)}`)
    .join(' ');
  const head = `${timestamp} [${level.toUpperCase()}] ${message}`;
  return extras ? `${head} ${extras}` : head;
}

/**
 * Core logging function.
 */
function log(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>,
): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  const requestId = currentRequestId();
  if (requestId) {
    entry.request_id = requestId;
  }

  if (data) {
    const masked = maskSecrets(data);
    if (masked && typeof masked === 'object') {
      Object.assign(entry, masked);
    }
  }

  // stderr: MCP stdio uses stdout for protocol frames
  console.error(formatEntry(entry, options.json));
}

/**
 * Logger instance with convenience methods.
 */
export const logger = {
  debug: (message: string, data?: Record<string, unknown>) =>
    log('debug', message, data),
  info: (message: string, data?: Record<string, unknown>) =>
    log('info', message, data),
  warn: (message: string, data?: Record<string, unknown>) =>
    log('warn', message, data),
  error: (message: string, data?: Record<string, unknown>) =>
    log('error', message, data),

  /**
   * Log an error with stack trace.
   */
  logError: (message: string, error: Error, data?: Record<string, unknown>) => {
    log('error', message, {
      ...data,
      error_name: error.name,
      error_message: error.message,
      error_stack: error.stack,
    });
  },
};
