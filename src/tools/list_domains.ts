/**
 * list_domains Tool - Account Domain Listing.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResponse } from '../types.js';
import { logger } from '../utils/logger.js';
import { toolFailure, toolSuccess, type DomainClient } from './response.js';

export const listDomainsSchema = z.object({});

export type ListDomainsInput = z.infer<typeof listDomainsSchema>;

/**
 * Tool definition for MCP.
 */
export const listDomainsTool: Tool = {
  name: 'list_domains',
  description: `List all domains in your Porkbun account.

Returns for each domain:
- Status (ACTIVE, EXPIRED, TRANSFER PENDING, ...)
- Creation and expiration dates
- WHOIS privacy and auto-renew settings`,
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

/**
 * Execute the list_domains tool.
 */
export async function executeListDomains(
  client: DomainClient,
  input: unknown = {},
): Promise<ToolResponse> {
  logger.info('Listing domains');

  try {
    listDomainsSchema.parse(input ?? {});
    const domains = await client.listDomains();

    return toolSuccess(
      `Found ${domains.length} domains in your account`,
      { domains, count: domains.length },
      [
        'Use get_domain_info for details on a specific domain',
        'Use get_pricing to check renewal costs',
        'Use renew_domain to extend registration',
      ],
    );
  } catch (error) {
    return toolFailure('Failed to list domains', error, [
      'Verify your API credentials are valid',
      'Check network connectivity',
    ]);
  }
}
