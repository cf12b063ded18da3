/**
 * Tool response helpers.
 *
 * Tools never throw: every outcome is a ToolResponse envelope.
 */

import { z } from 'zod';
import type { ToolResponse } from '../types.js';
import type { PorkbunDomainClient } from '../registrars/porkbun.js';
import { PorkbunApiError, wrapError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * The client operations tools depend on.
 */
export type DomainClient = Pick<
  PorkbunDomainClient,
  'listDomains' | 'getDomainInfo' | 'getAuthCode' | 'renewDomain' | 'getPricing'
>;

export function toolSuccess(
  message: string,
  data: Record<string, unknown>,
  nextSteps: string[],
): ToolResponse {
  return {
    success: true,
    message,
    data,
    next_steps: nextSteps,
  };
}

/**
 * Convert any failure into an envelope with a non-empty error string.
 * Input errors lead with their own fix before the static hints.
 */
export function toolFailure(
  message: string,
  error: unknown,
  nextSteps: string[],
  context: Record<string, unknown> = {},
): ToolResponse {
  const wrapped = wrapError(error);
  const detail = wrapped.message || wrapped.userMessage;

  logger.error(message, {
    ...context,
    error: detail,
    code: wrapped.code,
  });

  const hints =
    wrapped instanceof PorkbunApiError || !wrapped.suggestedAction
      ? nextSteps
      : [wrapped.suggestedAction, ...nextSteps];

  return {
    success: false,
    message,
    error: detail,
    next_steps: hints,
  };
}

const domainArgument = z.object({ domain: z.string() });

/**
 * The domain an agent asked about, for messages about calls whose input
 * may not have validated.
 */
export function requestedDomain(input: unknown): string {
  const parsed = domainArgument.safeParse(input);
  const domain = parsed.success ? parsed.data.domain.trim() : '';
  return domain || 'domain';
}
