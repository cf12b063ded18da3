/**
 * Tests for the MCP tools against a fake domain client.
 */

import {
  TOOLS,
  TOOL_EXECUTORS,
  executeGetAuthCode,
  executeGetDomainInfo,
  executeGetPricing,
  executeListDomains,
  executeRenewDomain,
  type DomainClient,
} from '../../src/tools/index';
import { executeToolCall } from '../../src/server';
import { PorkbunDomainClient } from '../../src/registrars/porkbun';
import { DomainNotFoundError, PorkbunApiError } from '../../src/utils/errors';
import type { Domain, PricingInfo, RenewalResult } from '../../src/types';
import { testSettings } from '../helpers/settings';

const EXAMPLE: Domain = {
  domain: 'example.com',
  status: 'ACTIVE',
  tld: 'com',
  create_date: '2021-03-01 12:00:00',
  expire_date: '2027-03-01 12:00:00',
  whois_privacy: '1',
  auto_renew: true,
  not_local: false,
};

const COM_PRICING: PricingInfo = {
  tld: 'com',
  registration: '9.68',
  renewal: '10.18',
  transfer: '9.68',
};

function fakeClient() {
  return {
    listDomains: jest.fn(async (): Promise<Domain[]> => [EXAMPLE]),
    getDomainInfo: jest.fn(async (_domain: string): Promise<Domain> => EXAMPLE),
    getAuthCode: jest.fn(async (_domain: string): Promise<string> => 'placeholder-epp'),
    renewDomain: jest.fn(
      async (domain: string, years: number = 1): Promise<RenewalResult> => ({
        domain,
        years,
        success: true,
        message: 'Domain renewed successfully',
      }),
    ),
    getPricing: jest.fn(
      async (_tld?: string): Promise<Record<string, PricingInfo>> => ({ com: COM_PRICING }),
    ),
  } satisfies DomainClient;
}

beforeEach(() => {
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('tool registry', () => {
  it('lists the five tools in order', () => {
    expect(TOOLS.map((t) => t.name)).toEqual([
      'list_domains',
      'get_domain_info',
      'get_auth_code',
      'renew_domain',
      'get_pricing',
    ]);
  });

  it('has an executor for every listed tool', () => {
    expect([...TOOL_EXECUTORS.keys()].sort()).toEqual(TOOLS.map((t) => t.name).sort());
  });
});

describe('list_domains', () => {
  it('returns the domains with a count', async () => {
    const response = await executeListDomains(fakeClient(), {});

    expect(response.success).toBe(true);
    expect(response.message).toBe('Found 1 domains in your account');
    expect(response.data).toEqual({ domains: [EXAMPLE], count: 1 });
    expect(response.next_steps).toHaveLength(3);
  });

  it('reports API failures without throwing', async () => {
    const client = fakeClient();
    client.listDomains.mockRejectedValue(
      new PorkbunApiError('transport', 'Request failed: socket hang up'),
    );

    const response = await executeListDomains(client, {});

    expect(response).toEqual({
      success: false,
      message: 'Failed to list domains',
      error: 'Request failed: socket hang up',
      next_steps: ['Verify your API credentials are valid', 'Check network connectivity'],
    });
  });

  it('never reports an empty error', async () => {
    const client = fakeClient();
    client.listDomains.mockRejectedValue(new Error(''));

    const response = await executeListDomains(client, {});

    expect(response.success).toBe(false);
    expect(response.error).toBe('Error');
  });
});

describe('get_domain_info', () => {
  it('normalizes the domain before the lookup', async () => {
    const client = fakeClient();

    const response = await executeGetDomainInfo(client, { domain: ' Example.COM ' });

    expect(client.getDomainInfo).toHaveBeenCalledWith('example.com');
    expect(response.success).toBe(true);
    expect(response.message).toBe('Retrieved information for example.com');
    expect(response.data).toEqual({ domain: EXAMPLE });
  });

  it('reports a domain outside the account', async () => {
    const client = fakeClient();
    client.getDomainInfo.mockRejectedValue(new DomainNotFoundError('example.org'));

    const response = await executeGetDomainInfo(client, { domain: 'example.org' });

    expect(response.success).toBe(false);
    expect(response.message).toBe('Failed to get info for example.org');
    expect(response.error).toBe('Domain example.org not found in account');
    expect(response.next_steps).toEqual([
      'Verify the domain name is correct',
      'Ensure the domain is in your account',
      'Use list_domains to see all your domains',
    ]);
  });

  it('rejects a malformed domain without calling the API', async () => {
    const client = fakeClient();

    const response = await executeGetDomainInfo(client, { domain: 'not a domain' });

    expect(client.getDomainInfo).not.toHaveBeenCalled();
    expect(response.success).toBe(false);
    expect(response.message).toBe('Failed to get info for not a domain');
    expect(response.error).toBe(
      'Invalid domain: not a domain - Contains invalid character: " "',
    );
    expect(response.next_steps?.[0]).toBe(
      'Pass the full domain name including its extension, e.g. "example.com".',
    );
  });

  it('rejects a missing domain argument', async () => {
    const response = await executeGetDomainInfo(fakeClient(), {});

    expect(response.success).toBe(false);
    expect(response.message).toBe('Failed to get info for domain');
    expect(response.error).toBe('Invalid input: domain: Required');
  });
});

describe('get_auth_code', () => {
  it('returns the code with its domain', async () => {
    const client = fakeClient();

    const response = await executeGetAuthCode(client, { domain: 'example.com.' });

    expect(client.getAuthCode).toHaveBeenCalledWith('example.com');
    expect(response.message).toBe('Retrieved auth code for example.com');
    expect(response.data).toEqual({ domain: 'example.com', auth_code: 'placeholder-epp' });
  });

  it('reports application errors from the API', async () => {
    const client = fakeClient();
    client.getAuthCode.mockRejectedValue(
      new PorkbunApiError('application', 'Domain is not opted in to API access.'),
    );

    const response = await executeGetAuthCode(client, { domain: 'example.com' });

    expect(response).toEqual({
      success: false,
      message: 'Failed to get auth code for example.com',
      error: 'Domain is not opted in to API access.',
      next_steps: [
        'Verify the domain is in your account',
        'Check if the domain is eligible for transfer',
      ],
    });
  });
});

describe('renew_domain', () => {
  it('renews for one year by default', async () => {
    const client = fakeClient();

    const response = await executeRenewDomain(client, { domain: 'example.com' });

    expect(client.renewDomain).toHaveBeenCalledWith('example.com', 1);
    expect(response.message).toBe('Renewed example.com for 1 year(s)');
    expect(response.data).toEqual({
      domain: 'example.com',
      years: 1,
      success: true,
      message: 'Domain renewed successfully',
    });
  });

  it('passes the requested years', async () => {
    const client = fakeClient();

    const response = await executeRenewDomain(client, { domain: 'example.com', years: 3 });

    expect(client.renewDomain).toHaveBeenCalledWith('example.com', 3);
    expect(response.message).toBe('Renewed example.com for 3 year(s)');
  });

  it('rejects more than ten years', async () => {
    const client = fakeClient();

    const response = await executeRenewDomain(client, { domain: 'example.com', years: 11 });

    expect(client.renewDomain).not.toHaveBeenCalled();
    expect(response.success).toBe(false);
    expect(response.message).toBe('Failed to renew example.com');
    expect(response.error).toBe(
      'Invalid input: years: Number must be less than or equal to 10',
    );
  });
});

describe('get_pricing', () => {
  it('returns every TLD when no filter is given', async () => {
    const client = fakeClient();

    const response = await executeGetPricing(client, {});

    expect(client.getPricing).toHaveBeenCalledWith(undefined);
    expect(response.message).toBe('Retrieved pricing for 1 TLD(s)');
    expect(response.data).toEqual({ pricing: [COM_PRICING], count: 1 });
  });

  it('normalizes the TLD filter', async () => {
    const client = fakeClient();

    await executeGetPricing(client, { tld: '.COM' });

    expect(client.getPricing).toHaveBeenCalledWith('com');
  });

  it('treats an empty TLD as no filter', async () => {
    const client = fakeClient();

    await executeGetPricing(client, { tld: '' });

    expect(client.getPricing).toHaveBeenCalledWith(undefined);
  });

  it('reports an unknown TLD as zero results', async () => {
    const client = fakeClient();
    client.getPricing.mockResolvedValue({});

    const response = await executeGetPricing(client, { tld: 'xyz' });

    expect(response.success).toBe(true);
    expect(response.message).toBe('Retrieved pricing for 0 TLD(s)');
    expect(response.data).toEqual({ pricing: [], count: 0 });
  });

  it('rejects a malformed TLD', async () => {
    const client = fakeClient();

    const response = await executeGetPricing(client, { tld: 'c' });

    expect(client.getPricing).not.toHaveBeenCalled();
    expect(response.success).toBe(false);
    expect(response.error).toBe(
      'Invalid TLD: c - Use 2-63 letters, or an xn-- form for internationalized TLDs',
    );
  });
});

describe('executeToolCall', () => {
  it('dispatches by tool name', async () => {
    const client = fakeClient();

    const response = await executeToolCall(client, 'get_auth_code', { domain: 'example.com' });

    expect(response.success).toBe(true);
    expect(client.getAuthCode).toHaveBeenCalledWith('example.com');
  });

  it('answers an unknown tool with a failure envelope', async () => {
    const response = await executeToolCall(fakeClient(), 'delete_everything', {});

    expect(response).toEqual({
      success: false,
      message: 'Unknown tool: delete_everything',
      error: 'Unknown tool: delete_everything',
      next_steps: [
        'Available tools: list_domains, get_domain_info, get_auth_code, renew_domain, get_pricing',
        'Call list_tools to see what this server offers',
      ],
    });
  });

  it.each(['constructor', 'hasOwnProperty', '__proto__', 'toString'])(
    'does not resolve %p to a built-in object member',
    async (name) => {
      const client = new PorkbunDomainClient(testSettings());

      const response = await executeToolCall(client, name, {});

      expect(response.success).toBe(false);
      expect(response.message).toBe(`Unknown tool: ${name}`);
      expect(response.error).toBe(`Unknown tool: ${name}`);
      expect(JSON.stringify(response)).not.toContain('test-secret');
    },
  );
});
