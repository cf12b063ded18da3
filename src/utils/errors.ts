/**
 * Custom Error Classes for Porkbun Domain MCP.
 *
 * Every error carries a machine-readable code, a message for the agent,
 * whether retrying could help, and what to do next.
 */

import { ZodError } from 'zod';

/**
 * Base error class for all Porkbun Domain MCP errors.
 */
export class PorkbunDomainError extends Error {
  /** Machine-readable error code */
  readonly code: string;
  /** User-friendly message */
  readonly userMessage: string;
  /** Can this operation be retried? */
  readonly retryable: boolean;
  /** Suggested action for the user */
  readonly suggestedAction?: string;

  constructor(
    code: string,
    message: string,
    userMessage: string,
    options?: {
      retryable?: boolean;
      suggestedAction?: string;
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = 'PorkbunDomainError';
    this.code = code;
    this.userMessage = userMessage;
    this.retryable = options?.retryable ?? false;
    this.suggestedAction = options?.suggestedAction;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  /**
   * Convert to a plain object for JSON responses.
   */
  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.userMessage,
      retryable: this.retryable,
      suggestedAction: this.suggestedAction,
    };
  }
}

/**
 * Failure categories of a Porkbun API call.
 *
 * - transport: connection, DNS or timeout failure (retried)
 * - http: non-2xx response (retried, then surfaced)
 * - application: envelope status other than SUCCESS (never retried)
 * - not_found: the domain is not in the account
 */
export type ApiErrorKind = 'transport' | 'http' | 'application' | 'not_found';

const API_ERROR_CODES: Record<ApiErrorKind, string> = {
  transport: 'TRANSPORT_ERROR',
  http: 'HTTP_ERROR',
  application: 'API_ERROR',
  not_found: 'NOT_FOUND',
};

const API_ERROR_ACTIONS: Record<ApiErrorKind, string> = {
  transport: 'Check network connectivity and try again.',
  http: 'Porkbun returned an HTTP error. Try again in a moment.',
  application:
    'Check your PORKBUN_DOMAIN_API_KEY and PORKBUN_DOMAIN_SECRET_KEY, and that API access is enabled for the domain.',
  not_found: 'Use list_domains to see the domains in your account.',
};

/**
 * Error raised by the Porkbun API client.
 */
export class PorkbunApiError extends PorkbunDomainError {
  readonly kind: ApiErrorKind;
  /** HTTP status code if a response was received */
  readonly status?: number;
  /** Response body for application errors */
  readonly details?: Record<string, unknown>;

  constructor(
    kind: ApiErrorKind,
    message: string,
    options?: {
      status?: number;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(API_ERROR_CODES[kind], message, `Porkbun API error: ${message}`, {
      retryable: kind === 'transport' || kind === 'http',
      suggestedAction: API_ERROR_ACTIONS[kind],
      cause: options?.cause,
    });
    this.name = 'PorkbunApiError';
    this.kind = kind;
    this.status = options?.status;
    this.details = options?.details;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      kind: this.kind,
      status: this.status,
      details: this.details,
    };
  }
}

/**
 * Raised when a domain lookup finds no exact match in the account.
 */
export class DomainNotFoundError extends PorkbunApiError {
  constructor(domain: string) {
    super('not_found', `Domain ${domain} not found in account`, {
      status: 404,
    });
    this.name = 'DomainNotFoundError';
  }
}

/**
 * Error when a domain name is invalid.
 */
export class InvalidDomainError extends PorkbunDomainError {
  constructor(domain: string, reason: string) {
    super(
      'INVALID_DOMAIN',
      `Invalid domain: ${domain} - ${reason}`,
      `The domain "${domain}" is not valid: ${reason}`,
      {
        retryable: false,
        suggestedAction:
          'Pass the full domain name including its extension, e.g. "example.com".',
      },
    );
    this.name = 'InvalidDomainError';
  }
}

/**
 * Error when a TLD filter is malformed.
 */
export class InvalidTldError extends PorkbunDomainError {
  constructor(tld: string, reason: string) {
    super(
      'INVALID_TLD',
      `Invalid TLD: ${tld} - ${reason}`,
      `The TLD "${tld}" is not valid: ${reason}`,
      {
        retryable: false,
        suggestedAction: 'Use a bare extension such as "com" or "io".',
      },
    );
    this.name = 'InvalidTldError';
  }
}

/**
 * Error when settings are missing or malformed.
 */
export class ConfigurationError extends PorkbunDomainError {
  constructor(problem: string, howToFix: string) {
    super(
      'CONFIG_ERROR',
      `Invalid configuration: ${problem}`,
      `Server configuration is invalid.`,
      {
        retryable: false,
        suggestedAction: howToFix,
      },
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * Error when a tool name is not registered.
 */
export class UnknownToolError extends PorkbunDomainError {
  constructor(name: string, available: string[]) {
    super(
      'UNKNOWN_TOOL',
      `Unknown tool: ${name}`,
      `The tool "${name}" is not available.`,
      {
        retryable: false,
        suggestedAction: `Available tools: ${available.join(', ')}`,
      },
    );
    this.name = 'UnknownToolError';
  }
}

/**
 * Convert any error to a PorkbunDomainError.
 */
export function wrapError(error: unknown): PorkbunDomainError {
  if (error instanceof PorkbunDomainError) {
    return error;
  }

  if (error instanceof ZodError) {
    const issues = error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      )
      .join('; ');
    return new PorkbunDomainError(
      'INVALID_INPUT',
      `Invalid input: ${issues}`,
      `The tool arguments are invalid: ${issues}`,
      {
        retryable: false,
        suggestedAction: 'Fix the arguments and call the tool again.',
        cause: error,
      },
    );
  }

  if (error instanceof Error) {
    return new PorkbunDomainError(
      'UNKNOWN_ERROR',
      error.message || error.name,
      'An unexpected error occurred.',
      {
        retryable: true,
        suggestedAction: 'Try again or check the server logs.',
        cause: error,
      },
    );
  }

  return new PorkbunDomainError(
    'UNKNOWN_ERROR',
    String(error),
    'An unexpected error occurred.',
    {
      retryable: true,
      suggestedAction: 'Try again or check the server logs.',
    },
  );
}
