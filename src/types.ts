/**
 * Porkbun Domain MCP - Core Type Definitions
 *
 * Records returned by the Porkbun API after validation, the settings
 * shape, and the envelope every tool hands back to the agent.
 */

// ═══════════════════════════════════════════════════════════════════════════
// DOMAIN TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Status values Porkbun reports for a domain.
 * The API may add others, so the field stays open.
 */
export type DomainStatus =
  | 'ACTIVE'
  | 'EXPIRED'
  | 'TRANSFER PENDING'
  | 'WHOIS PENDING';

/**
 * A domain registered in the account.
 * Snapshot of the remote record; never mutated locally.
 */
export interface Domain {
  /** Full domain name (e.g., "example.com") */
  domain: string;

  status: DomainStatus | (string & {});

  /** TLD without the dot (e.g., "com") */
  tld: string;

  /** Registration date as reported by Porkbun ("2021-03-01 12:00:00") */
  create_date: string | null;

  expire_date: string | null;

  whois_privacy: string | null;

  auto_renew: boolean | null;

  /** True when the domain is listed but not registered at Porkbun */
  not_local: boolean | null;
}

/**
 * Pricing for a single TLD. Prices are the decimal strings Porkbun sends.
 */
export interface PricingInfo {
  tld: string;
  registration: string | null;
  renewal: string | null;
  transfer: string | null;
}

/**
 * Transfer authorization (EPP) code. Sensitive: returned to the caller only.
 */
export interface AuthCode {
  domain: string;
  auth_code: string;
}

/**
 * Outcome of a renewal request.
 */
export interface RenewalResult {
  domain: string;
  years: number;
  success: boolean;
  message: string;
  new_expire_date?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// TOOL RESPONSE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Normalized envelope returned by every tool, success or failure.
 */
export interface ToolResponse {
  /** Whether the operation succeeded */
  success: boolean;

  /** Human-readable result message */
  message: string;

  /** Structured output data */
  data?: Record<string, unknown>;

  /** Error details when success is false */
  error?: string;

  /** Suggested follow-up actions */
  next_steps?: string[];
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type OutputFormat = 'table' | 'json' | 'both';

/**
 * Server settings after all layers have been merged and validated.
 */
export interface Settings {
  // Porkbun credentials
  apiKey: string;
  secretKey: string;

  // API client
  baseUrl: string;
  /** Request timeout in seconds */
  timeout: number;
  maxRetries: number;

  // HTTP transport
  enableHttpTransport: boolean;
  httpHost: string;
  httpPort: number;
  corsOrigins: string[];

  // Logging
  logLevel: LogLevel;
  logJson: boolean;

  // Tool output rendering
  outputFormat: OutputFormat;
}
