import noble, { type Peripheral } from '@stoprocent/noble';
import { describeRadioError, PresenceError } from './errors.js';
import { Logger } from './logger.js';
import { PeripheralCache } from './peripheral-cache.js';
import type { LinkStateListener, RadioLayer, SightingListener } from './radio.js';
import { withTimeout } from './utils.js';

/**
 * Noble-backed radio.
 *
 * Peripherals are remembered from 'discover' events so that connect() can be
 * called with a plain identifier; only the most recent ones are kept. Scanning allows duplicates: every advertisement
 * refreshes the RSSI.
 */
const MAX_REMEMBERED_PERIPHERALS = 256;

export class NobleRadio implements RadioLayer {
  private peripherals = new PeripheralCache<Peripheral>(MAX_REMEMBERED_PERIPHERALS);
  private onDiscover: ((peripheral: Peripheral) => void) | null = null;
  private logger = new Logger('NobleRadio');

  static adapterState(): string {
    return noble.state;
  }

  async waitForPoweredOn(timeoutMs: number): Promise<boolean> {
    if (noble.state === 'poweredOn') {
      return true;
    }

    this.logger.info(`Adapter state: ${noble.state}, waiting for power on...`);
    return new Promise<boolean>((resolve) => {
      const finish = (poweredOn: boolean) => {
        clearTimeout(timeout);
        noble.removeListener('stateChange', onStateChange);
        resolve(poweredOn);
      };
      const onStateChange = (state: string) => {
        this.logger.info(`Adapter state: ${state}`);
        if (state === 'poweredOn') {
          finish(true);
        }
      };
      const timeout = setTimeout(() => {
        this.logger.warn('⚠️  Bluetooth initialization timeout');
        finish(false);
      }, timeoutMs);

      noble.on('stateChange', onStateChange);
    });
  }

  async startScan(listener: SightingListener): Promise<void> {
    this.detachDiscover();

    const onDiscover = (peripheral: Peripheral) => {
      this.peripherals.remember(peripheral.id, peripheral);
      listener({
        id: peripheral.id,
        advertisedName: peripheral.advertisement?.localName || '',
        // Noble exposes no OS-cached name
        platformName: '',
        rssi: peripheral.rssi
      });
    };
    this.onDiscover = onDiscover;
    noble.on('discover', onDiscover);

    try {
      await noble.startScanningAsync([], true);
      this.logger.debug('Scanning started');
    } catch (error) {
      this.detachDiscover();
      throw new PresenceError('SCAN_FAILURE', describeRadioError(error));
    }
  }

  async stopScan(): Promise<void> {
    this.detachDiscover();
    try {
      await noble.stopScanningAsync();
    } catch (error) {
      this.logger.debug(`Stop scanning failed: ${describeRadioError(error)}`);
    }
  }

  async connect(deviceId: string, timeoutMs: number): Promise<void> {
    const peripheral = this.peripherals.get(deviceId);
    if (!peripheral) {
      throw new PresenceError('UNKNOWN_DEVICE', `Umbrella ${deviceId} has not been sighted yet`);
    }

    this.logger.info(`Connecting to ${peripheral.advertisement?.localName || deviceId}...`);
    try {
      await withTimeout(peripheral.connectAsync(), timeoutMs, 'Device connection timeout');
    } catch (error) {
      await this.abandonLink(peripheral);
      throw new PresenceError('CONNECT_FAILURE', describeRadioError(error));
    }
    this.logger.info(`Connected to ${deviceId}`);
  }

  async disconnect(deviceId: string): Promise<void> {
    const peripheral = this.peripherals.get(deviceId);
    if (!peripheral) {
      return;
    }
    await peripheral.disconnectAsync();
  }

  watchConnection(deviceId: string, listener: LinkStateListener): () => void {
    const peripheral = this.peripherals.get(deviceId);
    if (!peripheral) {
      this.logger.warn(`Cannot watch ${deviceId}: not sighted`);
      return () => {};
    }

    const onConnect = () => listener('connected');
    const onDisconnect = () => {
      this.logger.info(`Device ${deviceId} disconnected`);
      listener('disconnected');
    };
    peripheral.on('connect', onConnect);
    peripheral.on('disconnect', onDisconnect);
    const release = this.peripherals.pin(deviceId);

    return () => {
      release();
      peripheral.removeListener('connect', onConnect);
      peripheral.removeListener('disconnect', onDisconnect);
    };
  }

  async dispose(): Promise<void> {
    await this.stopScan();
    for (const peripheral of this.peripherals.values()) {
      peripheral.removeAllListeners();
    }
    this.peripherals.clear();
  }

  // A timed-out or failed attempt can leave the link half open
  private async abandonLink(peripheral: Peripheral): Promise<void> {
    if (peripheral.state !== 'connected' && peripheral.state !== 'connecting') {
      return;
    }
    try {
      await withTimeout(peripheral.disconnectAsync(), 5000, 'Disconnect timeout');
    } catch (error) {
      this.logger.warn(`⚠️ Cleanup after failed connect did not complete: ${describeRadioError(error)}`);
    }
  }

  private detachDiscover(): void {
    if (this.onDiscover) {
      noble.removeListener('discover', this.onDiscover);
      this.onDiscover = null;
    }
  }
}
