import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { randomUUID } from 'crypto';
import { Logger } from './logger.js';
import { getPackageMetadata } from './utils.js';
import { toolRegistry } from './mcp-tools.js';

// Transport storage for sessions
const transports = new Map<string, StreamableHTTPServerTransport>();
const logger = new Logger('MCP HTTP');

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function sessionIdOf(req: Request): string | undefined {
  const header = req.headers['mcp-session-id'];
  return typeof header === 'string' ? header : undefined;
}

/**
 * Optional bearer token check. Without a configured token every request passes.
 */
export function bearerAuth(token?: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!token) {
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader || authHeader !== `Bearer ${token}`) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }

    next();
  };
}

/**
 * MCP over streamable HTTP. Each session gets its own McpServer from the factory;
 * all of them drive the same controller.
 */
export function createMcpHttpApp(createServer: () => McpServer, token?: string): Express {
  const app = express();
  const authenticate = bearerAuth(token);

  app.use(express.json());

  // Permissive CORS for local network usage
  app.use(cors({
    origin: '*',
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS', 'DELETE'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Mcp-Session-Id'],
    exposedHeaders: ['Mcp-Session-Id']
  }));

  // MCP INFO endpoint - public discovery
  app.get('/mcp/info', (_req, res) => {
    const metadata = getPackageMetadata();

    res.set('Cache-Control', 'public, max-age=3600');
    res.json({
      name: metadata.name,
      version: metadata.version,
      description: metadata.description,
      tools: toolRegistry
    });
  });

  // MCP POST endpoint - main message handling
  app.post('/mcp', authenticate, async (req, res) => {
    try {
      const sessionId = sessionIdOf(req);
      let transport = sessionId ? transports.get(sessionId) : undefined;

      if (!transport) {
        if (sessionId || !isInitializeRequest(req.body)) {
          res.status(400).json({
            jsonrpc: '2.0',
            error: { code: -32000, message: 'Bad Request: no valid session ID provided' },
            id: null
          });
          return;
        }

        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (id: string) => {
            transports.set(id, created);
            logger.debug(`New session initialized: ${id}`);
          },
          enableJsonResponse: true // Allow JSON responses for simple testing
        });
        created.onclose = () => {
          if (created.sessionId) {
            transports.delete(created.sessionId);
          }
        };
        await createServer().connect(created);
        transport = created;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('Error handling request:', error);
      if (!res.headersSent) {
        res.status(500).json({
          error: 'Internal server error',
          message: errorMessage(error)
        });
      }
    }
  });

  // MCP GET endpoint - SSE streaming support
  app.get('/mcp', authenticate, async (req, res) => {
    try {
      const sessionId = sessionIdOf(req);
      const transport = sessionId ? transports.get(sessionId) : undefined;

      if (!transport) {
        res.status(404).json({ error: 'Session not found' });
        return;
      }

      await transport.handleRequest(req, res);
    } catch (error) {
      logger.error('Error handling SSE request:', error);
      if (!res.headersSent) {
        res.status(500).json({
          error: 'Internal server error',
          message: errorMessage(error)
        });
      }
    }
  });

  // MCP DELETE endpoint - session termination
  app.delete('/mcp', authenticate, async (req, res) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports.get(sessionId) : undefined;

    if (sessionId && transport) {
      transports.delete(sessionId);
      try {
        await transport.close();
      } catch (error) {
        logger.warn(`Failed to close session ${sessionId}: ${errorMessage(error)}`);
      }
      logger.debug(`Session terminated: ${sessionId}`);
    }

    res.status(204).send();
  });

  return app;
}

export function mcpSessionCount(): number {
  return transports.size;
}

// Cleanup function for graceful shutdown
export async function closeMcpSessions(): Promise<void> {
  const open = [...transports.values()];
  transports.clear();
  const results = await Promise.allSettled(open.map(transport => transport.close()));
  const failures = results.filter(result => result.status === 'rejected').length;
  if (failures > 0) {
    logger.warn(`${failures} session(s) failed to close cleanly`);
  }
  logger.info('All sessions closed');
}
