/**
 * Porkbun Domain Client.
 *
 * Account-level domain operations over the Porkbun JSON API.
 * Every request is a POST carrying the API key pair in its body, and every
 * response is an envelope: { status: "SUCCESS" | "ERROR", message?, ... }.
 *
 * API Docs: https://porkbun.com/api/json/v3/documentation
 */

import type { AxiosResponse } from 'axios';
import { z } from 'zod';
import { RegistrarClient, type RegistrarClientOptions } from './base.js';
import type { Domain, PricingInfo, RenewalResult, Settings } from '../types.js';
import { authPayload } from '../config.js';
import { logger } from '../utils/logger.js';
import { DomainNotFoundError, PorkbunApiError } from '../utils/errors.js';

export const ENDPOINTS = {
  listDomains: '/domain/listAll',
  authCode: (domain: string) => `/domain/getAuthCode/${encodeURIComponent(domain)}`,
  renew: (domain: string) => `/domain/renew/${encodeURIComponent(domain)}`,
  pricing: '/pricing/get',
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Zod Schemas for API Response Validation
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Porkbun sends flags as 1/0, "1"/"0" or booleans depending on the endpoint.
 */
const flagSchema = z
  .union([z.boolean(), z.number(), z.string()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    if (typeof value === 'boolean') return value;
    if (typeof value === 'number') return value !== 0;
    return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
  });

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value)));

/**
 * A domain as listed by /domain/listAll.
 */
const PorkbunDomainSchema = z
  .object({
    domain: z.string(),
    status: z.string().nullish(),
    tld: z.string().nullish(),
    createDate: optionalText,
    expireDate: optionalText,
    whoisPrivacy: optionalText,
    autoRenew: flagSchema,
    notLocal: flagSchema,
  })
  .transform(
    (raw): Domain => ({
      domain: raw.domain,
      status: raw.status ?? 'UNKNOWN',
      tld: raw.tld ?? raw.domain.slice(raw.domain.lastIndexOf('.') + 1),
      create_date: raw.createDate,
      expire_date: raw.expireDate,
      whois_privacy: raw.whoisPrivacy,
      auto_renew: raw.autoRenew,
      not_local: raw.notLocal,
    }),
  );

const DomainsResponseSchema = z.object({
  domains: z.array(PorkbunDomainSchema).default([]),
});

const AuthCodeResponseSchema = z.object({
  authcode: z.string().nullish(),
  auth_code: z.string().nullish(),
});

const RenewResponseSchema = z.object({
  message: z.string().optional(),
  expireDate: z.string().optional(),
});

const TldPricingSchema = z.object({
  registration: optionalText,
  renewal: optionalText,
  transfer: optionalText,
});

const PricingResponseSchema = z.object({
  pricing: z.record(z.string(), TldPricingSchema).default({}),
});

type Envelope = Record<string, unknown>;

function isEnvelope(value: unknown): value is Envelope {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
}

/**
 * Porkbun API client.
 */
export class PorkbunDomainClient extends RegistrarClient {
  readonly name = 'Porkbun';

  // ═════════════════════════════════════════════════════════════════════════
  // Transport
  // ═════════════════════════════════════════════════════════════════════════

  /**
   * Make an authenticated request, retrying transport and HTTP failures.
   * Envelopes reporting an error are raised at once, without retry.
   */
  async request(
    method: 'GET' | 'POST',
    endpoint: string,
    payload?: Record<string, unknown>,
  ): Promise<Envelope> {
    return this.retryWithBackoff(async (attempt) => {
      logger.debug('API request', { endpoint, attempt: attempt + 1 });
      const response = await this.send(method, endpoint, payload);
      const data = this.checkEnvelope(response, 'Unknown API error');
      logger.debug('API request successful', { endpoint, attempt: attempt + 1 });
      return data;
    }, `${method} ${endpoint}`);
  }

  /**
   * One attempt: transport failures and non-2xx responses become typed errors.
   */
  private async send(
    method: 'GET' | 'POST',
    endpoint: string,
    payload?: Record<string, unknown>,
  ): Promise<AxiosResponse<unknown>> {
    const http = this.getHttp();

    let response: AxiosResponse<unknown>;
    try {
      response = await http.request<unknown>({
        method,
        url: endpoint,
        data: { ...authPayload(this.settings), ...payload },
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PorkbunApiError('transport', `Request failed: ${reason}`, {
        cause: error,
      });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new PorkbunApiError(
        'http',
        `HTTP ${response.status}: ${bodyText(response.data)}`,
        { status: response.status },
      );
    }

    return response;
  }

  /**
   * Check the SUCCESS/ERROR envelope of a 2xx response.
   */
  private checkEnvelope(response: AxiosResponse<unknown>, fallbackMessage: string): Envelope {
    const data = response.data;

    if (!isEnvelope(data)) {
      throw new PorkbunApiError('application', 'Invalid API response format', {
        status: response.status,
        details: { body: bodyText(data) },
      });
    }

    const status = typeof data.status === 'string' ? data.status : '';
    if (status.toUpperCase() !== 'SUCCESS') {
      const message =
        typeof data.message === 'string' && data.message ? data.message : fallbackMessage;
      throw new PorkbunApiError('application', message, {
        status: response.status,
        details: data,
      });
    }

    return data;
  }

  /**
   * Validate an envelope against an endpoint schema.
   */
  private parse<S extends z.ZodTypeAny>(
    schema: S,
    data: Envelope,
    endpoint: string,
  ): z.output<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
      logger.warn('Porkbun API response validation failed', {
        endpoint,
        errors: result.error.issues,
      });
      throw new PorkbunApiError('application', 'Invalid API response format', {
        details: data,
      });
    }
    return result.data;
  }

  // ═════════════════════════════════════════════════════════════════════════
  // Domain Operations
  // ═════════════════════════════════════════════════════════════════════════

  /**
   * All domains in the account, in the order Porkbun returns them.
   */
  async listDomains(): Promise<Domain[]> {
    logger.debug('Listing domains');

    const data = await this.request('POST', ENDPOINTS.listDomains);
    return this.parse(DomainsResponseSchema, data, ENDPOINTS.listDomains).domains;
  }

  /**
   * Details for one domain.
   *
   * Porkbun has no single-domain endpoint, so this lists the account and
   * scans for an exact name match.
   */
  async getDomainInfo(domain: string): Promise<Domain> {
    logger.debug('Getting domain info', { domain });

    const domains = await this.listDomains();
    const match = domains.find((d) => d.domain === domain);
    if (!match) {
      throw new DomainNotFoundError(domain);
    }
    return match;
  }

  /**
   * Transfer authorization (EPP) code, or "" when Porkbun returns none.
   */
  async getAuthCode(domain: string): Promise<string> {
    logger.debug('Getting auth code', { domain });

    const endpoint = ENDPOINTS.authCode(domain);
    const data = await this.request('POST', endpoint);
    const parsed = this.parse(AuthCodeResponseSchema, data, endpoint);
    return parsed.authcode ?? parsed.auth_code ?? '';
  }

  /**
   * Renew a domain for the given number of years.
   */
  async renewDomain(domain: string, years: number = 1): Promise<RenewalResult> {
    logger.debug('Renewing domain', { domain, years });

    const endpoint = ENDPOINTS.renew(domain);
    const data = await this.request('POST', endpoint, { years });
    const parsed = this.parse(RenewResponseSchema, data, endpoint);

    const result: RenewalResult = {
      domain,
      years,
      success: true,
      message: parsed.message || 'Domain renewed successfully',
    };
    if (parsed.expireDate) {
      result.new_expire_date = parsed.expireDate;
    }
    return result;
  }

  /**
   * Registration, renewal and transfer prices keyed by TLD.
   *
   * Single attempt: this call does not go through the retry helper.
   * With a tld filter, returns only that entry, or {} when it is unknown.
   */
  async getPricing(tld?: string): Promise<Record<string, PricingInfo>> {
    logger.debug('Getting pricing', { tld });

    const response = await this.send('POST', ENDPOINTS.pricing);
    const data = this.checkEnvelope(response, 'Failed to get pricing');
    const parsed = this.parse(PricingResponseSchema, data, ENDPOINTS.pricing);

    const pricing: Record<string, PricingInfo> = {};
    for (const [key, prices] of Object.entries(parsed.pricing)) {
      pricing[key] = { tld: key, ...prices };
    }

    if (tld) {
      return Object.hasOwn(pricing, tld) ? { [tld]: pricing[tld] } : {};
    }

    return pricing;
  }
}

/**
 * Run fn with a client whose connections are released afterwards,
 * whether fn resolves or throws.
 */
export async function withPorkbunClient<T>(
  settings: Settings,
  fn: (client: PorkbunDomainClient) => Promise<T>,
  options: RegistrarClientOptions = {},
): Promise<T> {
  const client = new PorkbunDomainClient(settings, options);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
