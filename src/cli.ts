#!/usr/bin/env node
/**
 * porkbun-domain-mcp command line.
 *
 * Stopping, restarting and status of a daemonized server belong to the
 * process supervisor (systemd, Docker, launchd), not to this CLI.
 */

import { Command, InvalidArgumentError } from 'commander';
import { loadSettings } from './config.js';
import { healthSnapshot } from './health.js';
import { runServer } from './server.js';
import { resolveTransportConfig } from './transports/index.js';
import { wrapError } from './utils/errors.js';
import { logger } from './utils/logger.js';
import { SERVER_NAME, SERVER_VERSION } from './version.js';

interface StartOptions {
  http?: boolean;
  stdio?: boolean;
  port?: number;
  host?: string;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name(SERVER_NAME)
    .description('MCP server for managing domains in a Porkbun account')
    .version(SERVER_VERSION, '-v, --version');

  // ─── start ──────────────────────────────────────────────────────────────────
  program
    .command('start', { isDefault: true })
    .description('Start the MCP server (stdio unless HTTP is requested)')
    .option('--http', 'Serve MCP over Streamable HTTP')
    .option('--stdio', 'Serve MCP over stdio (overrides --http)')
    .option('--port <port>', 'HTTP port (implies --http)', parsePort)
    .option('--host <host>', 'HTTP bind address')
    .action(async (opts: StartOptions) => {
      const settings = loadSettings();
      await runServer(settings, resolveTransportConfig(settings, opts));
      process.exit(0);
    });

  // ─── health ─────────────────────────────────────────────────────────────────
  program
    .command('health')
    .description('Print a health snapshot of the local configuration')
    .action(() => {
      const settings = loadSettings();
      process.stdout.write(`${JSON.stringify(healthSnapshot(settings), null, 2)}\n`);
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      const wrapped = wrapError(error);
      logger.error('Failed to start server', {
        error: wrapped.message,
        code: wrapped.code,
        suggested_action: wrapped.suggestedAction,
      });
      process.exit(1);
    });
}
