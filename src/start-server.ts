#!/usr/bin/env node

import * as dotenv from 'dotenv';
import * as path from 'path';
import { TerminalAlertDispatcher } from './alert-dispatcher.js';
import { BondStore, FileKeyValueStore } from './bond-store.js';
import { loadConfig } from './config.js';
import { ControlServer } from './control-server.js';
import { MockRadio } from './mock-radio.js';
import { AdapterPermissionGate, StaticPermissionGate, type PermissionGate } from './permission-gate.js';
import { PresenceController } from './presence-controller.js';
import type { RadioLayer } from './radio.js';
import type { PresencePhase } from './state-machine.js';
import { StatusLog } from './status-log.js';
import { getPackageMetadata } from './utils.js';

// Load .env.local if it exists
dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });

interface RadioSetup {
  radio: RadioLayer;
  permissions: PermissionGate;
  mock: MockRadio | null;
  dispose(): Promise<void>;
}

async function createRadio(mockRadio: boolean, namePrefix: string): Promise<RadioSetup> {
  if (mockRadio) {
    const mock = new MockRadio([{
      id: 'mock-umbrella-01',
      advertisedName: `${namePrefix} (simulated)`,
      platformName: '',
      rssi: -58
    }]);
    return {
      radio: mock,
      permissions: new StaticPermissionGate(),
      mock,
      dispose: () => mock.stopScan()
    };
  }

  // Loaded lazily so mock mode runs on hosts without a Bluetooth stack
  const { NobleRadio } = await import('./noble-radio.js');
  const radio = new NobleRadio();
  return {
    radio,
    permissions: new AdapterPermissionGate(() => NobleRadio.adapterState()),
    mock: null,
    dispose: () => radio.dispose()
  };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const metadata = getPackageMetadata();

  console.log(`🚀 Starting ${metadata.name} ${metadata.version}`);
  console.log(`   Looking for: "${config.presence.namePrefix}*"`);
  console.log(`   Radio: ${config.mockRadio ? 'simulated' : 'Bluetooth adapter'}`);
  console.log(`   Saved umbrella: ${config.storePath}`);
  console.log(`   Control: http://${config.http.host}:${config.http.port}`);
  console.log(`   Log level: ${config.logLevel}`);
  if (config.http.token) {
    console.log('   Authentication: Bearer token required');
  } else {
    console.log('   Authentication: ⚠️  None (loopback only!)');
  }
  console.log('\n   Press Ctrl+C to stop\n');

  const radioSetup = await createRadio(config.mockRadio, config.presence.namePrefix);
  const statusLog = new StatusLog(config.statusLogSize);

  const controller = new PresenceController({
    radio: radioSetup.radio,
    bondStore: new BondStore(new FileKeyValueStore(config.storePath)),
    alerts: new TerminalAlertDispatcher({ bell: config.alertBell }),
    permissions: radioSetup.permissions
  }, config.presence);

  controller.on('status', (message: string, phase: PresencePhase) => {
    statusLog.push(phase, message);
  });

  const server = new ControlServer(controller, statusLog, {
    token: config.http.token,
    stdioDisabled: config.stdioDisabled
  });
  await server.startHttp(config.http.port, config.http.host);
  server.connectStdio().catch(error => {
    console.error('Failed to connect stdio transport:', error);
  });

  // Coming back to the foreground
  process.on('SIGCONT', () => {
    controller.resume().catch(error => {
      console.error('Resume failed:', error);
    });
  });

  const mock = radioSetup.mock;
  if (mock) {
    process.on('SIGUSR2', () => {
      console.log('📴 Simulating umbrella out of range');
      mock.dropAllLinks();
    });
  }

  // Handle uncaught errors to prevent server crash
  process.on('uncaughtException', (error) => {
    console.error('[CRITICAL] Uncaught exception:', error);
  });

  process.on('unhandledRejection', (reason) => {
    console.error('[CRITICAL] Unhandled promise rejection:', reason);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n👋 Shutting down (${signal})...`);
    await controller.dispose();
    await server.stop();
    await radioSetup.dispose();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch(error => {
          console.error('Shutdown failed:', error);
          process.exit(1);
        });
    });
  }

  await controller.start();
}

main().catch(error => {
  console.error('Fatal error:', error);
  process.exit(1);
});
