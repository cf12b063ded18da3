/**
 * Tool Registry.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResponse } from '../types.js';
import type { DomainClient } from './response.js';
import { listDomainsTool, executeListDomains } from './list_domains.js';
import { getDomainInfoTool, executeGetDomainInfo } from './get_domain_info.js';
import { getAuthCodeTool, executeGetAuthCode } from './get_auth_code.js';
import { renewDomainTool, executeRenewDomain } from './renew_domain.js';
import { getPricingTool, executeGetPricing } from './get_pricing.js';

export {
  listDomainsTool,
  listDomainsSchema,
  executeListDomains,
  type ListDomainsInput,
} from './list_domains.js';

export {
  getDomainInfoTool,
  getDomainInfoSchema,
  executeGetDomainInfo,
  type GetDomainInfoInput,
} from './get_domain_info.js';

export {
  getAuthCodeTool,
  getAuthCodeSchema,
  executeGetAuthCode,
  type GetAuthCodeInput,
} from './get_auth_code.js';

export {
  renewDomainTool,
  renewDomainSchema,
  executeRenewDomain,
  type RenewDomainInput,
} from './renew_domain.js';

export {
  getPricingTool,
  getPricingSchema,
  executeGetPricing,
  type GetPricingInput,
} from './get_pricing.js';

export { type DomainClient } from './response.js';

export type ToolExecutor = (
  client: DomainClient,
  args: unknown,
) => Promise<ToolResponse>;

/**
 * All available tools, in listing order.
 */
export const TOOLS: Tool[] = [
  listDomainsTool,
  getDomainInfoTool,
  getAuthCodeTool,
  renewDomainTool,
  getPricingTool,
];

/**
 * Tool names mapped to their executors.
 */
export const TOOL_EXECUTORS: ReadonlyMap<string, ToolExecutor> = new Map<string, ToolExecutor>([
  ['list_domains', executeListDomains],
  ['get_domain_info', executeGetDomainInfo],
  ['get_auth_code', executeGetAuthCode],
  ['renew_domain', executeRenewDomain],
  ['get_pricing', executeGetPricing],
]);
