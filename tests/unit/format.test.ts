import { formatToolResult } from '../../src/utils/format';
import type { ToolResponse } from '../../src/types';

const listing: ToolResponse = {
  success: true,
  message: 'Found 1 domains in your account',
  data: {
    domains: [
      {
        domain: 'example.com',
        status: 'ACTIVE',
        tld: 'com',
        create_date: '2021-03-01 12:00:00',
        expire_date: '2027-03-01 12:00:00',
        whois_privacy: null,
        auto_renew: true,
        not_local: false,
      },
    ],
    count: 1,
  },
  next_steps: ['Use get_domain_info for details on a specific domain'],
};

describe('formatToolResult', () => {
  it('renders pretty JSON', () => {
    expect(formatToolResult(listing, 'json')).toBe(JSON.stringify(listing, null, 2));
  });

  it('renders a domain listing as a table', () => {
    expect(formatToolResult(listing, 'table')).toBe(
      [
        'Found 1 domains in your account',
        '',
        '| Domain | Status | Expires | Auto-renew | WHOIS privacy |',
        '| --- | --- | --- | --- | --- |',
        '| example.com | ACTIVE | 2027-03-01 12:00:00 | Yes | - |',
        '',
        'Next steps:',
        '- Use get_domain_info for details on a specific domain',
      ].join('\n'),
    );
  });

  it('renders pricing rows', () => {
    const response: ToolResponse = {
      success: true,
      message: 'Retrieved pricing for 1 TLD(s)',
      data: {
        pricing: [{ tld: 'io', registration: '28.12', renewal: '41.00', transfer: null }],
        count: 1,
      },
    };

    expect(formatToolResult(response, 'table')).toBe(
      [
        'Retrieved pricing for 1 TLD(s)',
        '',
        '| TLD | Registration | Renewal | Transfer |',
        '| --- | --- | --- | --- |',
        '| io | 28.12 | 41.00 | - |',
      ].join('\n'),
    );
  });

  it('renders flat data as field rows', () => {
    const response: ToolResponse = {
      success: true,
      message: 'Renewed example.com for 2 year(s)',
      data: { domain: 'example.com', years: 2, success: true },
    };

    expect(formatToolResult(response, 'table')).toBe(
      [
        'Renewed example.com for 2 year(s)',
        '',
        '| Field | Value |',
        '| --- | --- |',
        '| domain | example.com |',
        '| years | 2 |',
        '| success | Yes |',
      ].join('\n'),
    );
  });

  it('renders failures with their error and hints', () => {
    const response: ToolResponse = {
      success: false,
      message: 'Failed to list domains',
      error: 'Request failed: socket hang up',
      next_steps: ['Check network connectivity'],
    };

    expect(formatToolResult(response, 'table')).toBe(
      [
        'Failed to list domains',
        '',
        'Error: Request failed: socket hang up',
        '',
        'Next steps:',
        '- Check network connectivity',
      ].join('\n'),
    );
  });

  it('escapes pipes inside cells', () => {
    const response: ToolResponse = {
      success: true,
      message: 'ok',
      data: { note: 'a|b' },
    };

    expect(formatToolResult(response, 'table')).toContain('| note | a\\|b |');
  });

  it('appends the JSON block in both mode', () => {
    const response: ToolResponse = { success: true, message: 'ok' };

    expect(formatToolResult(response, 'both')).toBe(
      `ok\n\n\`\`\`json\n${JSON.stringify(response, null, 2)}\n\`\`\``,
    );
  });
});
