/**
 * Base Registrar Client.
 *
 * Abstract class for registrar API clients. Provides:
 * - Lazily created HTTP handle with keep-alive connection pooling
 * - Explicit release of pooled connections
 * - Retry with exponential backoff
 */

import { Agent as HttpAgent } from 'node:http';
import { Agent as HttpsAgent } from 'node:https';
import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { Settings } from '../types.js';
import { logger } from '../utils/logger.js';
import { PorkbunApiError } from '../utils/errors.js';
import { SERVER_NAME, SERVER_VERSION } from '../version.js';

/**
 * Sleep helper.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RegistrarClientOptions {
  /** Replaces the backoff timer */
  sleep?: (ms: number) => Promise<void>;
  /** Replaces the HTTP layer used by axios */
  adapter?: AxiosAdapter;
}

/**
 * Abstract base class for registrar clients.
 */
export abstract class RegistrarClient {
  /** Human-readable name of the registrar */
  abstract readonly name: string;

  /** Base delay for exponential backoff (ms): 500, 1000, 2000, ... */
  protected readonly baseDelayMs: number = 500;

  protected readonly settings: Settings;

  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly adapter?: AxiosAdapter;

  private http: AxiosInstance | null = null;
  private agents: { http: HttpAgent; https: HttpsAgent } | null = null;

  constructor(settings: Settings, options: RegistrarClientOptions = {}) {
    this.settings = settings;
    this.sleepFn = options.sleep ?? sleep;
    this.adapter = options.adapter;
  }

  /**
   * Whether the HTTP handle has been created and not yet released.
   */
  get isOpen(): boolean {
    return this.http !== null;
  }

  /**
   * Get the HTTP handle, creating it on first use.
   */
  protected getHttp(): AxiosInstance {
    if (this.http) {
      return this.http;
    }

    const agents = {
      http: new HttpAgent({ keepAlive: true }),
      https: new HttpsAgent({ keepAlive: true }),
    };

    this.http = axios.create({
      baseURL: this.settings.baseUrl,
      timeout: this.settings.timeout * 1000,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        'User-Agent': `${SERVER_NAME}/${SERVER_VERSION}`,
      },
      httpAgent: agents.http,
      httpsAgent: agents.https,
      // Status codes are interpreted by the client, not thrown by axios
      validateStatus: () => true,
      ...(this.adapter ? { adapter: this.adapter } : {}),
    });
    this.agents = agents;

    logger.debug('HTTP client initialized', {
      registrar: this.name,
      base_url: this.settings.baseUrl,
      timeout_s: this.settings.timeout,
    });

    return this.http;
  }

  /**
   * Close pooled connections and release the HTTP handle.
   * Safe to call more than once; the next call reopens lazily.
   */
  async close(): Promise<void> {
    if (!this.http) {
      return;
    }

    this.agents?.http.destroy();
    this.agents?.https.destroy();
    this.agents = null;
    this.http = null;

    logger.debug('HTTP client closed', { registrar: this.name });
  }

  /**
   * Execute with retry and exponential backoff.
   *
   * Makes up to maxRetries + 1 attempts. Only retryable API errors
   * (transport and HTTP status failures) are retried; the delay before
   * attempt n + 1 is baseDelayMs * 2^n. The last failure is rethrown.
   */
  protected async retryWithBackoff<T>(
    fn: (attempt: number) => Promise<T>,
    operation: string,
  ): Promise<T> {
    const maxRetries = this.settings.maxRetries;

    for (let attempt = 0; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        if (!(error instanceof PorkbunApiError) || !error.retryable) {
          throw error;
        }

        logger.warn(`${this.name} request failed`, {
          operation,
          kind: error.kind,
          status_code: error.status,
          error: error.message,
          attempt: attempt + 1,
        });

        if (attempt >= maxRetries) {
          throw error;
        }

        const delay = this.baseDelayMs * Math.pow(2, attempt);
        logger.debug(`Retry ${attempt + 1}/${maxRetries} for ${operation}`, {
          delay_ms: delay,
        });
        await this.sleepFn(delay);
      }
    }
  }
}
