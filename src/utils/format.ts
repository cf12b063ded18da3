import type { OutputFormat, ToolResponse } from '../types.js';

type Row = Record<string, unknown>;

type Column = [key: string, header: string];

const DOMAIN_COLUMNS: Column[] = [
  ['domain', 'Domain'],
  ['status', 'Status'],
  ['expire_date', 'Expires'],
  ['auto_renew', 'Auto-renew'],
  ['whois_privacy', 'WHOIS privacy'],
];

const PRICING_COLUMNS: Column[] = [
  ['tld', 'TLD'],
  ['registration', 'Registration'],
  ['renewal', 'Renewal'],
  ['transfer', 'Transfer'],
];

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatCell(value: unknown): string {
  if (value === null || value === undefined || value === '') return '-';
  if (typeof value === 'boolean') return value ? 'Yes' : 'No';
  if (typeof value === 'string') return value.replace(/\|/g, '\\|');
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

function renderTable(headers: string[], rows: string[][]): string {
  const headerRow = `| ${headers.join(' | ')} |`;
  const separator = `| ${headers.map(() => '---').join(' | ')} |`;
  const body = rows.map((row) => `| ${row.join(' | ')} |`).join('\n');
  return [headerRow, separator, body].filter(Boolean).join('\n');
}

function renderRows(rows: unknown[], columns: Column[]): string {
  return renderTable(
    columns.map(([, header]) => header),
    rows.filter(isRow).map((row) => columns.map(([key]) => formatCell(row[key]))),
  );
}

function renderFields(record: Row): string {
  return renderTable(
    ['Field', 'Value'],
    Object.entries(record).map(([key, value]) => [key, formatCell(value)]),
  );
}

/**
 * Pick a table layout from the shape of the tool's data.
 */
function formatData(data: Row): string {
  if (Array.isArray(data.domains)) {
    return renderRows(data.domains, DOMAIN_COLUMNS);
  }
  if (Array.isArray(data.pricing)) {
    return renderRows(data.pricing, PRICING_COLUMNS);
  }
  if (isRow(data.domain)) {
    return renderFields(data.domain);
  }
  return renderFields(data);
}

function formatTable(response: ToolResponse): string {
  const sections: string[] = [response.message];

  if (response.data && Object.keys(response.data).length > 0) {
    sections.push(formatData(response.data));
  }
  if (response.error) {
    sections.push(`Error: ${response.error}`);
  }
  if (response.next_steps?.length) {
    sections.push(`Next steps:\n- ${response.next_steps.join('\n- ')}`);
  }

  return sections.join('\n\n');
}

/**
 * Render a tool response as MCP text content.
 */
export function formatToolResult(response: ToolResponse, format: OutputFormat): string {
  const json = JSON.stringify(response, null, 2);

  switch (format) {
    case 'json':
      return json;
    case 'table':
      return formatTable(response);
    case 'both':
      return `${formatTable(response)}\n\n\`\`\`json\n${json}\n\`\`\``;
  }
}
