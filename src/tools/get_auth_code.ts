/**
 * get_auth_code Tool - Transfer Authorization Code.
 *
 * The EPP code is a secret: it is returned to the caller and never
 * logged or stored.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { AuthCode, ToolResponse } from '../types.js';
import { validateDomain } from '../utils/validators.js';
import { logger } from '../utils/logger.js';
import {
  requestedDomain,
  toolFailure,
  toolSuccess,
  type DomainClient,
} from './response.js';

/**
 * Input schema for get_auth_code.
 */
export const getAuthCodeSchema = z.object({
  domain: z
    .string()
    .min(1)
    .max(253)
    .describe("Domain name including extension (e.g., 'example.com')."),
});

export type GetAuthCodeInput = z.infer<typeof getAuthCodeSchema>;

/**
 * Tool definition for MCP.
 */
export const getAuthCodeTool: Tool = {
  name: 'get_auth_code',
  description: `Get the transfer authorization code (EPP code) for a domain.

The code is required to transfer the domain to another registrar.
Treat it like a password.`,
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
 * Execute the get_auth_code tool.
 */
export async function executeGetAuthCode(
  client: DomainClient,
  input: unknown,
): Promise<ToolResponse> {
  let domain = requestedDomain(input);
  logger.info('Getting auth code', { domain });

  try {
    domain = validateDomain(getAuthCodeSchema.parse(input).domain);
    const code: AuthCode = {
      domain,
      auth_code: await client.getAuthCode(domain),
    };

    return toolSuccess(`Retrieved auth code for ${domain}`, { ...code }, [
      'Provide this code to the gaining registrar',
      'Unlock the domain at Porkbun before transfer',
      'Verify the admin email is correct for transfer approval',
    ]);
  } catch (error) {
    return toolFailure(
      `Failed to get auth code for ${domain}`,
      error,
      [
        'Verify the domain is in your account',
        'Check if the domain is eligible for transfer',
      ],
      { domain },
    );
  }
}
