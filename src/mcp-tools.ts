import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { Logger } from './logger.js';
import type { PresenceController } from './presence-controller.js';
import type { StatusLog } from './status-log.js';

const logger = new Logger('MCP Tool');

const TOOL_DEFINITIONS = {
  get_status: {
    title: 'Get Presence Status',
    description: 'Current phase, status line, bonded-umbrella monitoring loops and last error'
  },
  list_devices: {
    title: 'List Discovered Umbrellas',
    description: 'Umbrellas seen by the latest scan, strongest signal first'
  },
  scan_umbrellas: {
    title: 'Scan for Umbrellas',
    description: 'Clear the list and start a manual scan; poll list_devices for results'
  },
  connect_umbrella: {
    title: 'Connect to Umbrella',
    description: 'Connect to a discovered umbrella and remember it for automatic reconnects'
  },
  disconnect_umbrella: {
    title: 'Disconnect Umbrella',
    description: 'Drop the current link or stop looking for a lost umbrella, without raising an alert'
  },
  forget_umbrella: {
    title: 'Forget Saved Umbrella',
    description: 'Delete the remembered umbrella; a live connection is kept'
  },
  resume_monitoring: {
    title: 'Resume Monitoring',
    description: 'Same as bringing the app back to the foreground: one silent reconnect attempt'
  },
  get_status_history: {
    title: 'Get Status History',
    description: 'Status messages shown to the user, oldest first'
  }
} as const;

export type ToolName = keyof typeof TOOL_DEFINITIONS;

// Tool registry for dynamic tool listing
export const toolRegistry: Array<{ name: string; description: string }> =
  Object.entries(TOOL_DEFINITIONS).map(([name, definition]) => ({
    name,
    description: definition.description
  }));

export interface StatusHistoryArgs {
  since: string;
  limit: number;
}

export interface ToolHandlers {
  get_status(): Promise<CallToolResult>;
  list_devices(): Promise<CallToolResult>;
  scan_umbrellas(): Promise<CallToolResult>;
  connect_umbrella(args: { device_id: string }): Promise<CallToolResult>;
  disconnect_umbrella(): Promise<CallToolResult>;
  forget_umbrella(): Promise<CallToolResult>;
  resume_monitoring(): Promise<CallToolResult>;
  get_status_history(args: StatusHistoryArgs): Promise<CallToolResult>;
}

export function textResult(payload: unknown): CallToolResult {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(payload, null, 2)
    }]
  };
}

/**
 * Tool bodies, kept apart from the MCP server so they can be called directly
 */
export function createToolHandlers(controller: PresenceController, statusLog: StatusLog): ToolHandlers {
  return {
    async get_status() {
      return textResult(controller.getSnapshot());
    },

    async list_devices() {
      const devices = controller.getDevices();
      return textResult({ devices, count: devices.length });
    },

    async scan_umbrellas() {
      const started = await controller.startManualScan();
      const snapshot = controller.getSnapshot();
      return textResult({ started, status: snapshot.status, phase: snapshot.phase });
    },

    async connect_umbrella({ device_id }) {
      const connected = await controller.connectToDevice(device_id);
      const snapshot = controller.getSnapshot();
      return textResult({
        connected,
        status: snapshot.status,
        phase: snapshot.phase,
        error: snapshot.lastError
      });
    },

    async disconnect_umbrella() {
      await controller.disconnect();
      return textResult(controller.getSnapshot());
    },

    async forget_umbrella() {
      await controller.forget();
      return textResult({ status: controller.getSnapshot().status });
    },

    async resume_monitoring() {
      await controller.resume();
      return textResult(controller.getSnapshot());
    },

    async get_status_history({ since, limit }) {
      const entries = statusLog.getEntriesSince(since, limit + 1);
      return textResult({
        entries: entries.slice(0, limit),
        count: Math.min(entries.length, limit),
        truncated: entries.length > limit
      });
    }
  };
}

// Wrap handler to add logging
function logged<A>(name: ToolName, handler: (args: A) => Promise<CallToolResult>) {
  return async (args: A): Promise<CallToolResult> => {
    logger.info(`Executing '${name}' with args:`, JSON.stringify(args));
    try {
      const result = await handler(args);
      logger.debug(`'${name}' completed successfully`);
      return result;
    } catch (error) {
      logger.error(`'${name}' failed:`, error instanceof Error ? error.message : error);
      throw error;
    }
  };
}

export function registerMcpTools(server: McpServer, handlers: ToolHandlers): void {
  server.registerTool('get_status', { ...TOOL_DEFINITIONS.get_status, inputSchema: {} },
    logged('get_status', () => handlers.get_status()));

  server.registerTool('list_devices', { ...TOOL_DEFINITIONS.list_devices, inputSchema: {} },
    logged('list_devices', () => handlers.list_devices()));

  server.registerTool('scan_umbrellas', { ...TOOL_DEFINITIONS.scan_umbrellas, inputSchema: {} },
    logged('scan_umbrellas', () => handlers.scan_umbrellas()));

  server.registerTool('connect_umbrella', {
    ...TOOL_DEFINITIONS.connect_umbrella,
    inputSchema: {
      device_id: z.string().min(1).describe('Device id as returned by list_devices')
    }
  }, logged('connect_umbrella', (args: { device_id: string }) => handlers.connect_umbrella(args)));

  server.registerTool('disconnect_umbrella', { ...TOOL_DEFINITIONS.disconnect_umbrella, inputSchema: {} },
    logged('disconnect_umbrella', () => handlers.disconnect_umbrella()));

  server.registerTool('forget_umbrella', { ...TOOL_DEFINITIONS.forget_umbrella, inputSchema: {} },
    logged('forget_umbrella', () => handlers.forget_umbrella()));

  server.registerTool('resume_monitoring', { ...TOOL_DEFINITIONS.resume_monitoring, inputSchema: {} },
    logged('resume_monitoring', () => handlers.resume_monitoring()));

  server.registerTool('get_status_history', {
    ...TOOL_DEFINITIONS.get_status_history,
    inputSchema: {
      since: z.string().default('all').describe("Time filter: duration (30s, 5m, 1h), ISO timestamp, or 'all'"),
      limit: z.number().int().min(1).max(1000).default(100).describe('Maximum entries to return')
    }
  }, logged('get_status_history', (args: StatusHistoryArgs) => handlers.get_status_history(args)));
}
