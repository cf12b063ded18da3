/**
 * HTTP Transport for MCP Server
 *
 * Implements the MCP Streamable HTTP transport. Each session gets its own
 * MCP server instance; all of them share the one Porkbun client.
 *
 * Routes:
 * - POST /mcp - JSON-RPC message endpoint
 * - GET /mcp - SSE stream for server-initiated messages
 * - DELETE /mcp - Session termination
 * - GET /health - Health check endpoint
 * - GET / - Server info
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { randomUUID } from 'node:crypto';
import type { Server as HttpServer } from 'node:http';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import type { Settings } from '../types.js';
import type { TransportConfig } from './index.js';
import { healthSnapshot } from '../health.js';
import { logger } from '../utils/logger.js';
import { SERVER_NAME } from '../version.js';

/**
 * Creates an Express app serving MCP over Streamable HTTP.
 *
 * @param createMcpServer - Builds a fresh MCP server for each new session
 * @returns Object with Express app and start/stop functions
 */
export function createHttpTransport(
  createMcpServer: () => Server,
  config: TransportConfig,
  settings: Settings,
) {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  const origins = config.corsOrigins ?? settings.corsOrigins;
  app.use(
    cors({
      origin: origins.includes('*') ? '*' : origins,
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: [
        'Content-Type',
        'Authorization',
        'Mcp-Session-Id',
        'Mcp-Protocol-Version',
        'Last-Event-ID',
      ],
      exposedHeaders: ['Mcp-Session-Id'],
    }),
  );

  // 100 requests per minute per IP; health checks exempt
  app.use(
    rateLimit({
      windowMs: 60 * 1000,
      limit: 100,
      standardHeaders: true,
      legacyHeaders: false,
      message: {
        error: 'Too many requests',
        message: 'Rate limit exceeded. Please try again later.',
        retryAfter: 60,
      },
      skip: (req) => req.path === '/health',
    }),
  );

  // Active transports by session ID
  const transports = new Map<string, StreamableHTTPServerTransport>();

  app.all('/mcp', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handleMcpRequest(req, res);
    } catch (error) {
      next(error);
    }
  });

  async function handleMcpRequest(req: Request, res: Response): Promise<void> {
    const header = req.headers['mcp-session-id'];
    const sessionId = typeof header === 'string' ? header : undefined;
    const existing = sessionId ? transports.get(sessionId) : undefined;

    if (req.method === 'GET' || req.method === 'DELETE') {
      if (!existing) {
        res.status(400).json({
          error: 'No active session',
          message: 'Establish a session first with POST /mcp',
        });
        return;
      }
      await existing.handleRequest(req, res);
      return;
    }

    if (req.method !== 'POST') {
      res.status(405).json({
        error: 'Method not allowed',
        allowed: ['GET', 'POST', 'DELETE'],
      });
      return;
    }

    if (existing) {
      await existing.handleRequest(req, res, req.body);
      return;
    }

    if (sessionId) {
      res.status(404).json({
        error: 'Session not found',
        message: 'Invalid or expired session ID',
      });
      return;
    }

    if (!isInitializeRequest(req.body)) {
      res.status(400).json({
        jsonrpc: '2.0',
        error: {
          code: -32000,
          message: 'Bad Request: No valid session ID provided',
        },
        id: null,
      });
      return;
    }

    // New session: the transport registers itself once initialize succeeds
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sid) => {
        transports.set(sid, transport);
        logger.debug('MCP session opened', { session_id: sid });
      },
    });

    transport.onclose = () => {
      const sid = transport.sessionId;
      if (sid) {
        transports.delete(sid);
        logger.debug('MCP session closed', { session_id: sid });
      }
    };

    transport.onerror = (error) => {
      logger.error('HTTP transport error', { error: error.message });
    };

    await createMcpServer().connect(transport);
    await transport.handleRequest(req, res, req.body);
  }

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      ...healthSnapshot(settings),
      transport: 'http',
      activeSessions: transports.size,
      uptime: process.uptime(),
    });
  });

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      name: SERVER_NAME,
      transport: 'Streamable HTTP',
      endpoints: {
        mcp: '/mcp',
        health: '/health',
      },
    });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not found',
      message: 'Use /mcp for MCP protocol, /health for health check',
    });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.logError('HTTP transport unhandled error', err);
    res.status(500).json({
      error: 'Internal server error',
    });
  });

  let server: HttpServer | null = null;

  return {
    app,

    /**
     * Start the HTTP server
     */
    start(): Promise<void> {
      const port = config.port ?? settings.httpPort;
      const host = config.host ?? settings.httpHost;

      return new Promise((resolve, reject) => {
        const listening = app.listen(port, host, () => {
          logger.info('HTTP transport listening', { host, port });
          resolve();
        });

        listening.on('error', (err: NodeJS.ErrnoException) => {
          if (err.code === 'EADDRINUSE') {
            reject(new Error(`Port ${port} is already in use`));
          } else {
            reject(err);
          }
        });

        server = listening;
      });
    },

    /**
     * Stop the HTTP server and close all transports
     */
    async stop(): Promise<void> {
      for (const transport of transports.values()) {
        await transport.close();
      }
      transports.clear();

      const current = server;
      server = null;
      if (!current) {
        return;
      }

      await new Promise<void>((resolve, reject) => {
        current.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },

    /**
     * Get count of active sessions
     */
    getActiveSessionCount(): number {
      return transports.size;
    },
  };
}
