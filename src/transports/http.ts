/**
 * HTTP Transport for MCP Server
 *
 * Implements the MCP Streamable HTTP transport.
 *
 * Routes:
 * - POST /mcp - JSON-RPC message endpoint
 * - GET /mcp - SSE stream for server-initiated messages
 * - DELETE /mcp - end a session
 * - POST /api/tools/:name - REST tool execution
 * - GET /openapi.json - OpenAPI document for the REST surface
 * - GET /health - Health check endpoint
 * - GET / - Server info
 */

import express, { type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import { randomUUID } from 'node:crypto';
import type { Server as HttpServer } from 'node:http';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { TransportConfig } from './index.js';
import { SERVER_NAME, SERVER_VERSION } from '../config.js';
import { logger } from '../utils/logger.js';
import { generateOpenAPISpec } from '../openapi/generator.js';
import { createApiRouter } from '../api/routes.js';

export interface HttpTransportHandle {
  app: express.Express;
  start(): Promise<void>;
  stop(): Promise<void>;
  getActiveSessionCount(): number;
}

/**
 * Creates an Express server with MCP HTTP transport.
 *
 * Each session gets its own MCP Server instance from `createMcpServer`,
 * since a Server is bound to a single transport.
 */
export function createHttpTransport(
  createMcpServer: () => Server,
  config: TransportConfig,
): HttpTransportHandle {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.use(
    cors({
      origin: config.corsOrigins ?? ['*'],
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: [
        'Content-Type',
        'Authorization',
        'Mcp-Session-Id',
        'Last-Event-ID',
      ],
      exposedHeaders: ['Mcp-Session-Id'],
    }),
  );

  const transports = new Map<string, StreamableHTTPServerTransport>();

  app.use('/api', createApiRouter());

  const handleMcpRequest = async (req: Request, res: Response): Promise<void> => {
    const sessionHeader = req.headers['mcp-session-id'];
    const sessionId = typeof sessionHeader === 'string' ? sessionHeader : undefined;
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
      logger.logError('HTTP transport error', error);
    };

    await createMcpServer().connect(transport);
    await transport.handleRequest(req, res, req.body);
  };

  app.all('/mcp', (req: Request, res: Response, next: NextFunction) => {
    handleMcpRequest(req, res).catch(next);
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      transport: 'http',
      activeSessions: transports.size,
      uptime: process.uptime(),
    });
  });

  app.get('/openapi.json', (req: Request, res: Response) => {
    const forwardedProto = req.headers['x-forwarded-proto'];
    const forwardedHost = req.headers['x-forwarded-host'];
    const protocol = typeof forwardedProto === 'string' ? forwardedProto : req.protocol;
    const host = typeof forwardedHost === 'string' ? forwardedHost : req.headers.host ?? 'localhost';

    res.json(generateOpenAPISpec(`${protocol}://${host}`));
  });

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      name: SERVER_NAME,
      version: SERVER_VERSION,
      transport: 'Streamable HTTP',
      endpoints: {
        mcp: '/mcp',
        tools: '/api/tools/{name}',
        openapi: '/openapi.json',
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
    logger.logError('Unhandled HTTP error', err);
    res.status(500).json({
      error: 'Internal server error',
      message: process.env.NODE_ENV === 'development' ? err.message : undefined,
    });
  });

  let server: HttpServer | null = null;

  return {
    app,

    start(): Promise<void> {
      const port = config.port ?? 3000;
      const host = config.host ?? '0.0.0.0';

      return new Promise((resolve, reject) => {
        const listening = app.listen(port, host, () => {
          server = listening;
          resolve();
        });

        listening.on('error', (err: NodeJS.ErrnoException) => {
          if (err.code === 'EADDRINUSE') {
            reject(new Error(`Port ${port} is already in use`));
          } else {
            reject(err);
          }
        });
      });
    },

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

    getActiveSessionCount(): number {
      return transports.size;
    },
  };
}
