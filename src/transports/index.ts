/**
 * Transport Selection
 *
 * The server speaks MCP over stdio (desktop clients launch it as a child
 * process) or over Streamable HTTP (long-running service).
 */

import type { Settings } from '../types.js';

export type TransportType = 'stdio' | 'http';

export interface TransportConfig {
  type: TransportType;
  port?: number;
  host?: string;
  corsOrigins?: string[];
}

/**
 * Command-line overrides for the transport.
 */
export interface TransportFlags {
  http?: boolean;
  stdio?: boolean;
  port?: number;
  host?: string;
}

/**
 * Determines transport configuration from CLI flags and settings.
 *
 * Priority order:
 * 1. --stdio
 * 2. --http, or --port (implies HTTP)
 * 3. enableHttpTransport setting (PORKBUN_DOMAIN_ENABLE_HTTP_TRANSPORT)
 * 4. Default: stdio
 *
 * @example
 * ```bash
 * porkbun-domain-mcp start --http --port 3043
 * PORKBUN_DOMAIN_ENABLE_HTTP_TRANSPORT=true porkbun-domain-mcp start
 * ```
 */
export function resolveTransportConfig(
  settings: Settings,
  flags: TransportFlags = {},
): TransportConfig {
  if (flags.stdio) {
    return { type: 'stdio' };
  }

  const isHttpMode =
    flags.http === true || flags.port !== undefined || settings.enableHttpTransport;

  if (isHttpMode) {
    return {
      type: 'http',
      port: flags.port ?? settings.httpPort,
      host: flags.host ?? settings.httpHost,
      corsOrigins: settings.corsOrigins,
    };
  }

  return { type: 'stdio' };
}

/**
 * Human-readable transport description for startup messages.
 */
export function formatTransportInfo(config: TransportConfig): string {
  if (config.type === 'stdio') {
    return 'stdio (standard I/O)';
  }
  return `HTTP on ${config.host}:${config.port}`;
}
