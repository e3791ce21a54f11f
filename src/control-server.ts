import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import type { Server } from 'http';
import os from 'os';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Logger } from './logger.js';
import { createToolHandlers, registerMcpTools, type ToolHandlers } from './mcp-tools.js';
import { bearerAuth, closeMcpSessions, createMcpHttpApp, mcpSessionCount } from './mcp-http-transport.js';
import type { PresenceController } from './presence-controller.js';
import type { StatusLog } from './status-log.js';
import { getPackageMetadata } from './utils.js';

export interface ControlServerOptions {
  token?: string;
  stdioDisabled: boolean;
}

// Forward rejected promises to the express error handler
function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

/**
 * Control Server - the operator's screen
 *
 * This server provides:
 * - HTTP health check and device list
 * - HTTP routes for the user actions (scan, connect, disconnect, forget, resume)
 * - MCP tools over HTTP and stdio
 */
export class ControlServer {
  private handlers: ToolHandlers;
  private httpServer: Server | null = null;
  private stdioServer: McpServer | null = null;
  private stdioEnabled = false;
  private logger = new Logger('ControlServer');
  private readonly app: Express;

  constructor(
    private readonly controller: PresenceController,
    private readonly statusLog: StatusLog,
    private readonly options: ControlServerOptions
  ) {
    this.handlers = createToolHandlers(controller, statusLog);
    this.app = this.buildApp();
  }

  getApp(): Express {
    return this.app;
  }

  createMcpServer(): McpServer {
    const metadata = getPackageMetadata();
    const server = new McpServer({
      name: metadata.name,
      version: metadata.version
    });
    registerMcpTools(server, this.handlers);
    return server;
  }

  private buildApp(): Express {
    const app = express();
    const authenticate = bearerAuth(this.options.token);

    app.use(createMcpHttpApp(() => this.createMcpServer(), this.options.token));

    app.get('/health', (_req, res) => {
      res.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        hostname: os.hostname(),
        presence: this.controller.getSnapshot(),
        mcp: {
          stdio: this.stdioEnabled,
          httpAuth: Boolean(this.options.token),
          sessions: mcpSessionCount()
        },
        lastStatus: this.statusLog.latest()
      });
    });

    app.get('/devices', (_req, res) => {
      res.json({ devices: this.controller.getDevices() });
    });

    app.post('/scan', authenticate, asyncRoute(async (_req, res) => {
      const started = await this.controller.startManualScan();
      res.status(started ? 202 : 409).json(this.controller.getSnapshot());
    }));

    app.post('/devices/:id/connect', authenticate, asyncRoute(async (req, res) => {
      const connected = await this.controller.connectToDevice(req.params.id);
      res.status(connected ? 200 : 409).json(this.controller.getSnapshot());
    }));

    app.post('/disconnect', authenticate, asyncRoute(async (_req, res) => {
      await this.controller.disconnect();
      res.json(this.controller.getSnapshot());
    }));

    app.post('/forget', authenticate, asyncRoute(async (_req, res) => {
      await this.controller.forget();
      res.json(this.controller.getSnapshot());
    }));

    app.post('/resume', authenticate, asyncRoute(async (_req, res) => {
      await this.controller.resume();
      res.json(this.controller.getSnapshot());
    }));

    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
      this.logger.error('Request failed:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: error instanceof Error ? error.message : String(error)
      });
    });

    return app;
  }

  async startHttp(port: number, host: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host, () => {
        this.logger.info(`Listening on http://${host}:${port}`);
        this.logger.info(`   Health check: http://${host}:${port}/health`);
        this.logger.info(`   MCP info: http://${host}:${port}/mcp/info`);
        if (!this.options.token) {
          this.logger.warn('⚠️  Running without authentication - keep the host on loopback!');
        }
        resolve();
      });
      server.once('error', reject);
      this.httpServer = server;
    });
  }

  /**
   * Connect MCP stdio transport if available
   */
  async connectStdio(): Promise<boolean> {
    const hasTty = Boolean(process.stdin.isTTY && process.stdout.isTTY);
    if (!hasTty || this.options.stdioDisabled) {
      return false;
    }

    const server = this.createMcpServer();
    await server.connect(new StdioServerTransport());
    this.stdioServer = server;
    this.stdioEnabled = true;
    this.logger.info('Stdio transport connected');
    return true;
  }

  async stop(): Promise<void> {
    await closeMcpSessions();

    if (this.stdioServer) {
      await this.stdioServer.close();
      this.stdioServer = null;
      this.stdioEnabled = false;
    }

    const server = this.httpServer;
    this.httpServer = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      });
    }
  }
}
