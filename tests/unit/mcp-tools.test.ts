import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createToolHandlers, registerMcpTools, toolRegistry, type ToolHandlers } from '../../src/mcp-tools.js';
import { PresenceController } from '../../src/presence-controller.js';
import { PresencePhase } from '../../src/state-machine.js';
import { MockRadio } from '../../src/mock-radio.js';
import { BondStore, MemoryKeyValueStore } from '../../src/bond-store.js';
import { StaticPermissionGate } from '../../src/permission-gate.js';
import { StatusLog } from '../../src/status-log.js';

const OPTIONS = {
  namePrefix: 'Smart Umbrella',
  manualScanMs: 10000,
  autoScanMs: 6000,
  reconnectScanMs: 4000,
  reconnectIntervalMs: 3000,
  alertIntervalMs: 3000,
  connectTimeoutMs: 10000,
  radioReadyTimeoutMs: 5000
};

function parseText(result: { content?: unknown; [key: string]: unknown }): unknown {
  const content = result.content;
  if (!Array.isArray(content) || content.length === 0) {
    throw new Error('Tool returned no content');
  }
  const first: unknown = content[0];
  if (typeof first !== 'object' || first === null || !('text' in first) || typeof first.text !== 'string') {
    throw new Error('Tool returned no text');
  }
  return JSON.parse(first.text);
}

describe('MCP tools', () => {
  let radio: MockRadio;
  let controller: PresenceController;
  let statusLog: StatusLog;
  let handlers: ToolHandlers;

  beforeEach(() => {
    radio = new MockRadio();
    controller = new PresenceController({
      radio,
      bondStore: new BondStore(new MemoryKeyValueStore()),
      alerts: {
        showAlert: vi.fn().mockResolvedValue(undefined),
        cancelAllAlerts: vi.fn().mockResolvedValue(undefined)
      },
      permissions: new StaticPermissionGate()
    }, OPTIONS);
    statusLog = new StatusLog(100);
    controller.on('status', (message: string, phase: PresencePhase) => statusLog.push(phase, message));
    handlers = createToolHandlers(controller, statusLog);
  });

  afterEach(async () => {
    await controller.dispose();
  });

  it('lists every tool in the registry', () => {
    expect(toolRegistry.map(tool => tool.name)).toEqual([
      'get_status',
      'list_devices',
      'scan_umbrellas',
      'connect_umbrella',
      'disconnect_umbrella',
      'forget_umbrella',
      'resume_monitoring',
      'get_status_history'
    ]);
  });

  it('scans, lists and connects through the handlers', async () => {
    expect(parseText(await handlers.scan_umbrellas())).toEqual({
      started: true,
      status: 'Scanning...',
      phase: 'SCANNING'
    });

    radio.emitSighting({ id: 'u1', advertisedName: 'Smart Umbrella 1', platformName: '', rssi: -60 });
    expect(parseText(await handlers.list_devices())).toEqual({
      devices: [{ id: 'u1', displayName: 'Smart Umbrella 1', signalStrength: -60 }],
      count: 1
    });

    expect(parseText(await handlers.connect_umbrella({ device_id: 'u1' }))).toEqual({
      connected: true,
      status: 'Connected (Smart Umbrella 1)',
      phase: 'CONNECTED',
      error: null
    });
  });

  it('reports a failed connect with its error', async () => {
    expect(parseText(await handlers.connect_umbrella({ device_id: 'ghost' }))).toEqual({
      connected: false,
      status: 'Connect failed: Umbrella ghost is not in the discovered list',
      phase: 'IDLE',
      error: {
        code: 'UNKNOWN_DEVICE',
        message: 'Umbrella ghost is not in the discovered list'
      }
    });
  });

  it('returns the status history with truncation', async () => {
    await handlers.scan_umbrellas();
    await handlers.disconnect_umbrella();
    await handlers.forget_umbrella();

    const history = parseText(await handlers.get_status_history({ since: 'all', limit: 2 }));
    expect(history).toMatchObject({ count: 2, truncated: true });
    expect(statusLog.getEntriesSince('all', 10).map(e => e.message)).toEqual([
      'Scanning...',
      'Not Connected',
      'Saved umbrella cleared'
    ]);
  });

  it('serves the tools over an MCP session', async () => {
    const server = new McpServer({ name: 'umbrella-watch-test', version: '0.0.0' });
    registerMcpTools(server, handlers);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);

    const client = new Client({ name: 'test-client', version: '0.0.0' });
    await client.connect(clientTransport);

    const { tools } = await client.listTools();
    expect(tools.map(tool => tool.name).sort()).toEqual(toolRegistry.map(tool => tool.name).sort());

    const status = parseText(await client.callTool({ name: 'get_status', arguments: {} }));
    expect(status).toMatchObject({ phase: 'IDLE', status: 'Not Connected', lostModeActive: false });

    await client.close();
    await server.close();
  });
});
