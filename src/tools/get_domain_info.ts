/**
 * get_domain_info Tool - Single Domain Details.
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
 * Input schema for get_domain_info.
 */
export const getDomainInfoSchema = z.object({
  domain: z
    .string()
    .min(1)
    .max(253)
    .describe("Domain name including extension (e.g., 'example.com')."),
});

export type GetDomainInfoInput = z.infer<typeof getDomainInfoSchema>;

/**
 * Tool definition for MCP.
 */
export const getDomainInfoTool: Tool = {
  name: 'get_domain_info',
  description: `Get detailed information for a domain in your Porkbun account.

Example:
- get_domain_info("example.com") → status, dates, privacy and auto-renew`,
  inputSchema: {
    type: 'object',
    properties: {
      domain: {
        type: 'string',
        description: "Domain name including extension (e.g., 'example.com').",
      },
    },
    required: ['domain'],
  },
};

/**
 * Execute the get_domain_info tool.
 */
export async function executeGetDomainInfo(
  client: DomainClient,
  input: unknown,
): Promise<ToolResponse> {
  let domain = requestedDomain(input);
  logger.info('Getting domain info', { domain });

  try {
    domain = validateDomain(getDomainInfoSchema.parse(input).domain);
    const info = await client.getDomainInfo(domain);

    return toolSuccess(
      `Retrieved information for ${domain}`,
      { domain: info },
      [
        'Use get_auth_code to get transfer authorization',
        'Use renew_domain to extend registration',
      ],
    );
  } catch (error) {
    return toolFailure(
      `Failed to get info for ${domain}`,
      error,
      [
        'Verify the domain name is correct',
        'Ensure the domain is in your account',
        'Use list_domains to see all your domains',
      ],
      { domain },
    );
  }
}
