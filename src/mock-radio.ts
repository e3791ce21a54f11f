// In-process radio for tests and for running without an adapter
import { Logger } from './logger.js';
import type { LinkState, LinkStateListener, RadioLayer, Sighting, SightingListener } from './radio.js';
import { withTimeout } from './utils.js';

/**
 * How connect() behaves for a device:
 * - succeed: resolves immediately
 * - fail: rejects as if the peripheral refused
 * - hang: never answers, so the caller's timeout fires
 * - manual: waits for resolveConnect() / rejectConnect()
 */
export type ConnectBehavior = 'succeed' | 'fail' | 'hang' | 'manual';

interface PendingConnect {
  resolve: () => void;
  reject: (error: Error) => void;
}

export class MockRadio implements RadioLayer {
  poweredOn = true;
  readonly calls = {
    startScan: 0,
    stopScan: 0,
    connect: [] as string[],
    disconnect: [] as string[]
  };

  private listener: SightingListener | null = null;
  private advertiseTimer: NodeJS.Timeout | null = null;
  private linked = new Set<string>();
  private watchers = new Map<string, Set<LinkStateListener>>();
  private behaviors = new Map<string, ConnectBehavior>();
  private pending = new Map<string, PendingConnect>();
  private logger = new Logger('MockRadio');

  /**
   * @param simulated - advertisements replayed every `advertiseEveryMs` while scanning
   */
  constructor(
    private readonly simulated: Sighting[] = [],
    private readonly advertiseEveryMs = 1000
  ) {}

  async waitForPoweredOn(): Promise<boolean> {
    return this.poweredOn;
  }

  async startScan(listener: SightingListener): Promise<void> {
    if (!this.poweredOn) {
      throw new Error('Bluetooth adapter is powered off');
    }
    this.calls.startScan++;
    this.listener = listener;

    if (this.simulated.length > 0 && !this.advertiseTimer) {
      this.advertiseTimer = setInterval(() => {
        for (const sighting of this.simulated) {
          this.emitSighting(sighting);
        }
      }, this.advertiseEveryMs);
    }
  }

  async stopScan(): Promise<void> {
    this.calls.stopScan++;
    this.listener = null;
    if (this.advertiseTimer) {
      clearInterval(this.advertiseTimer);
      this.advertiseTimer = null;
    }
  }

  isScanning(): boolean {
    return this.listener !== null;
  }

  /** Deliver one advertisement; returns false when nobody is scanning */
  emitSighting(sighting: Sighting): boolean {
    if (!this.listener) {
      return false;
    }
    this.listener(sighting);
    return true;
  }

  setConnectBehavior(deviceId: string, behavior: ConnectBehavior): void {
    this.behaviors.set(deviceId, behavior);
  }

  async connect(deviceId: string, timeoutMs: number): Promise<void> {
    this.calls.connect.push(deviceId);
    const behavior = this.behaviors.get(deviceId) ?? 'succeed';
    this.logger.debug(`connect(${deviceId}) -> ${behavior}`);

    switch (behavior) {
      case 'fail':
        throw new Error('Connection rejected by peripheral');
      case 'hang':
        await withTimeout(new Promise<void>(() => {}), timeoutMs, 'Device connection timeout');
        break;
      case 'manual':
        await new Promise<void>((resolve, reject) => {
          this.pending.set(deviceId, { resolve, reject });
        });
        break;
      case 'succeed':
        break;
    }

    this.linked.add(deviceId);
  }

  resolveConnect(deviceId: string): boolean {
    const pending = this.pending.get(deviceId);
    if (!pending) return false;
    this.pending.delete(deviceId);
    pending.resolve();
    return true;
  }

  rejectConnect(deviceId: string, error = new Error('Connection rejected by peripheral')): boolean {
    const pending = this.pending.get(deviceId);
    if (!pending) return false;
    this.pending.delete(deviceId);
    pending.reject(error);
    return true;
  }

  async disconnect(deviceId: string): Promise<void> {
    this.calls.disconnect.push(deviceId);
    if (this.linked.delete(deviceId)) {
      this.notify(deviceId, 'disconnected');
    }
  }

  /** The peripheral walked out of range */
  dropLink(deviceId: string): void {
    if (this.linked.delete(deviceId)) {
      this.notify(deviceId, 'disconnected');
    }
  }

  dropAllLinks(): void {
    for (const deviceId of [...this.linked]) {
      this.dropLink(deviceId);
    }
  }

  isLinked(deviceId: string): boolean {
    return this.linked.has(deviceId);
  }

  watchConnection(deviceId: string, listener: LinkStateListener): () => void {
    let listeners = this.watchers.get(deviceId);
    if (!listeners) {
      listeners = new Set();
      this.watchers.set(deviceId, listeners);
    }
    listeners.add(listener);

    return () => {
      this.watchers.get(deviceId)?.delete(listener);
    };
  }

  watcherCount(deviceId: string): number {
    return this.watchers.get(deviceId)?.size ?? 0;
  }

  private notify(deviceId: string, state: LinkState): void {
    for (const listener of [...(this.watchers.get(deviceId) ?? [])]) {
      listener(state);
    }
  }
}
