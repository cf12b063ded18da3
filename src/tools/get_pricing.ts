/**
 * get_pricing Tool - TLD Pricing.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResponse } from '../types.js';
import { validateTld } from '../utils/validators.js';
import { logger } from '../utils/logger.js';
import { toolFailure, toolSuccess, type DomainClient } from './response.js';

/**
 * Input schema for get_pricing.
 */
export const getPricingSchema = z.object({
  tld: z
    .string()
    .max(64)
    .nullish()
    .describe("Optional TLD to filter by (e.g., 'com', 'net'). Omit for all TLDs."),
});

export type GetPricingInput = z.infer<typeof getPricingSchema>;

/**
 * Tool definition for MCP.
 */
export const getPricingTool: Tool = {
  name: 'get_pricing',
  description: `Get Porkbun registration, renewal and transfer prices.

Examples:
- get_pricing() → prices for every TLD Porkbun sells
- get_pricing("io") → prices for .io only`,
  inputSchema: {
    type: 'object',
    properties: {
      tld: {
        type: 'string',
        description: "Optional TLD to filter by (e.g., 'com', 'net'). Omit for all TLDs.",
      },
    },
  },
};

/**
 * Execute the get_pricing tool.
 */
export async function executeGetPricing(
  client: DomainClient,
  input: unknown = {},
): Promise<ToolResponse> {
  try {
    const { tld } = getPricingSchema.parse(input ?? {});
    const filter = tld ? validateTld(tld) : undefined;
    logger.info('Getting pricing', { tld: filter });

    const pricing = Object.values(await client.getPricing(filter));

    return toolSuccess(
      `Retrieved pricing for ${pricing.length} TLD(s)`,
      { pricing, count: pricing.length },
      [
        'Compare prices across TLDs',
        'Use this info to plan domain registrations',
      ],
    );
  } catch (error) {
    return toolFailure('Failed to get pricing information', error, [
      'Try again later',
      'Check network connectivity',
    ]);
  }
}
