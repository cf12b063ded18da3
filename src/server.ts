/**
 * Porkbun Domain MCP Server.
 *
 * Model Context Protocol server for managing the domains in a Porkbun
 * account.
 *
 * Tools:
 * - list_domains: List all domains in the account
 * - get_domain_info: Details for one domain
 * - get_auth_code: Transfer authorization (EPP) code
 * - renew_domain: Renew a registration
 * - get_pricing: Registration, renewal and transfer prices per TLD
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import type { Settings, ToolResponse } from './types.js';
import { hasCredentials, maskApiKey } from './config.js';
import { withPorkbunClient } from './registrars/porkbun.js';
import { TOOLS, TOOL_EXECUTORS, type DomainClient } from './tools/index.js';
import { toolFailure } from './tools/response.js';
import { createHttpTransport } from './transports/http.js';
import { formatTransportInfo, type TransportConfig } from './transports/index.js';
import { UnknownToolError } from './utils/errors.js';
import { formatToolResult } from './utils/format.js';
import {
  configureLogger,
  generateRequestId,
  logger,
  withRequestId,
} from './utils/logger.js';
import { SERVER_NAME, SERVER_VERSION } from './version.js';

// ═══════════════════════════════════════════════════════════════════════════
// Tool Dispatch
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Execute a tool call by name. Always resolves to an envelope.
 */
export async function executeToolCall(
  client: DomainClient,
  name: string,
  args: Record<string, unknown>,
): Promise<ToolResponse> {
  const executor = TOOL_EXECUTORS.get(name);
  if (!executor) {
    return toolFailure(
      `Unknown tool: ${name}`,
      new UnknownToolError(name, TOOLS.map((t) => t.name)),
      ['Call list_tools to see what this server offers'],
    );
  }
  return executor(client, args);
}

/**
 * Create and configure an MCP server bound to a client.
 */
export function createServer(client: DomainClient, settings: Settings): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const requestId = generateRequestId();

    return withRequestId(requestId, async () => {
      logger.info('Tool call started', { tool: name });

      const response = await executeToolCall(client, name, args ?? {}).catch(
        (error: unknown) => toolFailure(`Failed to run ${name}`, error, []),
      );

      logger.info('Tool call completed', { tool: name, success: response.success });

      return {
        content: [
          {
            type: 'text' as const,
            text: formatToolResult(response, settings.outputFormat),
          },
        ],
        isError: !response.success,
      };
    });
  });

  return server;
}

// ═══════════════════════════════════════════════════════════════════════════
// Startup
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Resolve with the first SIGINT or SIGTERM received.
 */
function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  });
}

/**
 * Start the chosen transport and return its stop function.
 */
async function startTransport(
  client: DomainClient,
  settings: Settings,
  transportConfig: TransportConfig,
): Promise<() => Promise<void>> {
  if (transportConfig.type === 'http') {
    const http = createHttpTransport(
      () => createServer(client, settings),
      transportConfig,
      settings,
    );
    await http.start();
    return () => http.stop();
  }

  const server = createServer(client, settings);
  await server.connect(new StdioServerTransport());
  return () => server.close();
}

/**
 * Serve on the chosen transport until SIGINT or SIGTERM.
 * Resolves once the transport is stopped and the client is closed.
 */
export async function runServer(
  settings: Settings,
  transportConfig: TransportConfig,
): Promise<void> {
  configureLogger({ level: settings.logLevel, json: settings.logJson });

  logger.info('Porkbun Domain MCP starting', {
    version: SERVER_VERSION,
    node_version: process.version,
    transport: formatTransportInfo(transportConfig),
    api_url: settings.baseUrl,
    api_key: maskApiKey(settings.apiKey),
  });

  if (!hasCredentials(settings)) {
    logger.warn(
      'API credentials not configured. Set PORKBUN_DOMAIN_API_KEY and PORKBUN_DOMAIN_SECRET_KEY.',
    );
  }

  await withPorkbunClient(settings, async (client) => {
    const stopTransport = await startTransport(client, settings, transportConfig);

    logger.info('Porkbun Domain MCP ready', {
      tools: TOOLS.length,
      transport: formatTransportInfo(transportConfig),
    });

    const signal = await waitForShutdownSignal();
    logger.info('Shutting down...', { signal });
    await stopTransport();
  });

  logger.info('Porkbun domain client closed');
}
