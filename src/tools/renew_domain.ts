/**
 * renew_domain Tool - Domain Renewal.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResponse } from '../types.js';
import { validateDomain } from '../utils/validators.js';
import { logger } from '../utils/logger.js';
import {
  requestedDomain,
  toolFailure,
  toolSuccess,
  type DomainClient,
} from './response.js';

/**
 * Input schema for renew_domain.
 */
export const renewDomainSchema = z.object({
  domain: z
    .string()
    .min(1)
    .max(253)
    .describe("Domain name including extension (e.g., 'example.com')."),
  years: z
    .number()
    .int()
    .min(1)
    .max(10)
    .optional()
    .default(1)
    .describe('Number of years to renew (1-10). Defaults to 1.'),
});

export type RenewDomainInput = z.infer<typeof renewDomainSchema>;

/**
 * Tool definition for MCP.
 */
export const renewDomainTool: Tool = {
  name: 'renew_domain',
  description: `Renew a domain registration in your Porkbun account.

Charges the account balance for the renewal.

Example:
- renew_domain("example.com", 2) → extends registration by two years`,
  inputSchema: {
    type: 'object',
    properties: {
      domain: {
        type: 'string',
        description: "Domain name including extension (e.g., 'example.com').",
      },
      years: {
        type: 'integer',
        minimum: 1,
        maximum: 10,
        description: 'Number of years to renew (1-10). Defaults to 1.',
      },
    },
    required: ['domain'],
  },
};

/**
 * Execute the renew_domain tool.
 */
export async function executeRenewDomain(
  client: DomainClient,
  input: unknown,
): Promise<ToolResponse> {
  let domain = requestedDomain(input);

  try {
    const args = renewDomainSchema.parse(input);
    domain = validateDomain(args.domain);
    logger.info('Renewing domain', { domain, years: args.years });

    const result = await client.renewDomain(domain, args.years);

    return toolSuccess(
      `Renewed ${domain} for ${args.years} year(s)`,
      { ...result },
      [
        'Check the new expiration date',
        'Verify auto-renew is configured if desired',
      ],
    );
  } catch (error) {
    return toolFailure(
      `Failed to renew ${domain}`,
      error,
      [
        'Verify the domain is in your account',
        'Check if the domain is eligible for renewal',
        'Ensure you have sufficient account balance',
      ],
      { domain },
    );
  }
}
