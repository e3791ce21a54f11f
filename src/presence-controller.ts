import { EventEmitter } from 'events';
import type { AlertDispatcher } from './alert-dispatcher.js';
import type { BondStore } from './bond-store.js';
import {
  CAPABILITIES,
  STATUS_MESSAGES,
  connectFailedStatus,
  connectedStatus,
  permissionDeniedStatus,
  reconnectFailedStatus,
  scanFailedStatus
} from './constants.js';
import { DeviceRegistry, type DiscoveredDevice } from './device-registry.js';
import { describeRadioError, PRESENCE_ERROR_CODES, type PresenceErrorCode } from './errors.js';
import { Logger } from './logger.js';
import { LostAlertLoop } from './lost-alert-loop.js';
import type { PermissionGate } from './permission-gate.js';
import type { LinkState, RadioLayer, Sighting } from './radio.js';
import { ReconnectLoop } from './reconnect-loop.js';
import { PresencePhase, StateMachine } from './state-machine.js';

export interface PresenceControllerOptions {
  namePrefix: string;
  manualScanMs: number;
  autoScanMs: number;
  reconnectScanMs: number;
  reconnectIntervalMs: number;
  alertIntervalMs: number;
  connectTimeoutMs: number;
  radioReadyTimeoutMs: number;
}

export interface PresenceDependencies {
  radio: RadioLayer;
  bondStore: BondStore;
  alerts: AlertDispatcher;
  permissions: PermissionGate;
}

export type ScanOrigin = 'manual' | 'startup' | 'reconnect';

interface ScanSession {
  id: number;
  origin: ScanOrigin;
  targetId: string | null;
  timer: NodeJS.Timeout | null;
  active: boolean;
}

export interface SessionSummary {
  sessionId: number;
  origin: ScanOrigin;
  discovered: number;
  matched: boolean;
}

export interface PresenceSnapshot {
  phase: PresencePhase;
  activeDeviceId: string | null;
  lostModeActive: boolean;
  status: string;
  scanning: boolean;
  scanOrigin: ScanOrigin | null;
  connectInFlight: string | null;
  halted: boolean;
  alertLoopArmed: boolean;
  reconnectLoopArmed: boolean;
  lastError: { code: PresenceErrorCode; message: string } | null;
  devices: DiscoveredDevice[];
}

/**
 * Presence Controller - sole owner of the umbrella's presence state
 *
 * Every phase change goes through enterPhase(), which keeps the two session
 * invariants in one place: lost mode is armed exactly while LOST, and the
 * active device id is set exactly while CONNECTING or CONNECTED.
 *
 * Events:
 * - 'status': (message: string, phase: PresencePhase)
 * - 'phase': (to: PresencePhase, from: PresencePhase)
 * - 'devices': (devices: DiscoveredDevice[])
 * - 'sessionEnded': (summary: SessionSummary) - once per scan session that ran to
 *   its deadline or found its target; superseded sessions report nothing
 */
export class PresenceController extends EventEmitter {
  private machine = new StateMachine();
  private registry: DeviceRegistry;
  private alertLoop: LostAlertLoop;
  private reconnectLoop: ReconnectLoop;
  private logger = new Logger('PresenceController');

  private activeDeviceId: string | null = null;
  private lostModeActive = false;
  private status: string = STATUS_MESSAGES.NOT_CONNECTED;
  private session: ScanSession | null = null;
  private sessionSeq = 0;
  private connectInFlight: string | null = null;
  // Bumped by user disconnect and dispose so a late connect result can tell it is stale
  private connectGeneration = 0;
  private unwatchLink: (() => void) | null = null;
  private halted = false;
  private lastError: { code: PresenceErrorCode; message: string } | null = null;
  private disposed = false;

  constructor(
    private readonly deps: PresenceDependencies,
    private readonly options: PresenceControllerOptions
  ) {
    super();
    this.registry = new DeviceRegistry(options.namePrefix);
    this.alertLoop = new LostAlertLoop(deps.alerts, options.alertIntervalMs);
    this.reconnectLoop = new ReconnectLoop(options.reconnectIntervalMs, () => this.attemptReconnect());
  }

  // === User and host entry points ===

  /**
   * App start: check capabilities, then look for the bonded umbrella once
   */
  async start(): Promise<void> {
    if (this.disposed) return;

    const ready = await this.ensureReady();
    if (!ready) {
      return;
    }
    await this.tryBondedReconnect('app start');
  }

  /**
   * Host came back to the foreground
   */
  async resume(): Promise<void> {
    if (this.disposed) return;

    if (this.halted) {
      this.logger.info('Resume ignored: waiting for the user to retry after a permission or radio problem');
      return;
    }

    switch (this.machine.getState()) {
      case PresencePhase.IDLE:
        await this.tryBondedReconnect('resume');
        break;
      case PresencePhase.LOST:
        await this.attemptReconnect();
        break;
      default:
        this.logger.debug(`Resume ignored in ${this.machine.getState()}`);
    }
  }

  /**
   * Clear the list and scan for every umbrella in range
   */
  async startManualScan(): Promise<boolean> {
    if (this.disposed) return false;

    if (this.isConnectBusy()) {
      this.setStatus(STATUS_MESSAGES.BUSY_CONNECTING);
      return false;
    }

    const ready = await this.ensureReady();
    if (!ready) {
      return false;
    }
    if (this.isConnectBusy()) {
      this.setStatus(STATUS_MESSAGES.BUSY_CONNECTING);
      return false;
    }

    this.registry.clear();
    this.emitDevices();
    this.setStatus(STATUS_MESSAGES.SCANNING);
    await this.runScanSession('manual', null, this.options.manualScanMs);
    return true;
  }

  /**
   * User tapped an entry of the discovered list
   */
  async connectToDevice(deviceId: string): Promise<boolean> {
    if (this.disposed) return false;

    if (this.connectInFlight) {
      this.logger.warn(`Ignoring connect to ${deviceId}: attempt to ${this.connectInFlight} still in flight`);
      return false;
    }

    const phase = this.machine.getState();
    if (phase === PresencePhase.CONNECTED) {
      this.setStatus(STATUS_MESSAGES.ALREADY_CONNECTED);
      return false;
    }

    if (!this.registry.get(deviceId)) {
      const message = `Umbrella ${deviceId} is not in the discovered list`;
      this.recordError(PRESENCE_ERROR_CODES.UNKNOWN_DEVICE, message);
      this.setStatus(connectFailedStatus(message));
      return false;
    }

    if (this.cancelSession('device selected')) {
      void this.stopRadioScan();
    }
    return this.attemptConnect(deviceId);
  }

  async disconnect(): Promise<void> {
    if (this.disposed) return;

    const phase = this.machine.getState();
    const deviceId = this.activeDeviceId;
    this.connectGeneration++;

    switch (phase) {
      case PresencePhase.CONNECTED:
        this.unwatch();
        this.enterPhase(PresencePhase.IDLE, 'user disconnect');
        break;
      case PresencePhase.CONNECTING:
        this.enterPhase(PresencePhase.IDLE, 'user cancelled connect');
        break;
      case PresencePhase.LOST:
        this.enterPhase(PresencePhase.IDLE, 'user stopped looking');
        break;
      default:
        break;
    }

    this.setStatus(STATUS_MESSAGES.NOT_CONNECTED);

    if (phase === PresencePhase.CONNECTED && deviceId) {
      await this.dropLink(deviceId);
    }
  }

  /**
   * Delete the remembered umbrella. A live connection is left alone.
   */
  async forget(): Promise<void> {
    if (this.disposed) return;

    await this.deps.bondStore.forget();
    this.logger.info('Bonded umbrella forgotten');
    this.setStatus(STATUS_MESSAGES.BOND_CLEARED);
  }

  /**
   * Cancel every timer and subscription the controller owns
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    this.connectGeneration++;

    const hadSession = this.cancelSession('shutdown');
    this.unwatch();
    this.disarmLostMode();
    this.activeDeviceId = null;
    this.machine.reset();

    if (hadSession) {
      await this.stopRadioScan();
    }
    this.logger.info('Disposed');
  }

  // === Read interface ===

  getPhase(): PresencePhase {
    return this.machine.getState();
  }

  getDevices(): DiscoveredDevice[] {
    return this.registry.snapshot();
  }

  getSnapshot(): PresenceSnapshot {
    return {
      phase: this.machine.getState(),
      activeDeviceId: this.activeDeviceId,
      lostModeActive: this.lostModeActive,
      status: this.status,
      scanning: this.session !== null,
      scanOrigin: this.session?.origin ?? null,
      connectInFlight: this.connectInFlight,
      halted: this.halted,
      alertLoopArmed: this.alertLoop.isArmed(),
      reconnectLoopArmed: this.reconnectLoop.isArmed(),
      lastError: this.lastError ? { ...this.lastError } : null,
      devices: this.registry.snapshot()
    };
  }

  // === Transitions ===

  private enterPhase(to: PresencePhase, context: string, deviceId: string | null = null): void {
    const from = this.machine.getState();
    this.machine.transition(to, context);

    this.activeDeviceId = to === PresencePhase.CONNECTING || to === PresencePhase.CONNECTED
      ? deviceId
      : null;

    if (to === PresencePhase.LOST) {
      this.armLostMode();
    } else {
      this.disarmLostMode();
    }

    this.emit('phase', to, from);
  }

  private armLostMode(): void {
    this.lostModeActive = true;
    this.alertLoop.arm();
    this.armReconnectLoop();
  }

  private armReconnectLoop(): void {
    if (this.halted) {
      this.logger.warn('Reconnect loop not armed: waiting for the user to retry after a permission or radio problem');
      return;
    }

    this.loadBondedId().then(bondedId => {
      if (!this.lostModeActive || this.halted) {
        return;
      }
      if (!bondedId) {
        this.logger.warn('No bonded umbrella stored: it will not be reconnected automatically');
        return;
      }
      this.reconnectLoop.arm();
    }).catch(error => {
      this.logger.error('Failed to arm reconnect loop:', error);
    });
  }

  private disarmLostMode(): void {
    this.lostModeActive = false;
    this.alertLoop.disarm();
    this.reconnectLoop.disarm();
  }

  // === Readiness ===

  private async ensureReady(): Promise<boolean> {
    try {
      const grants = await this.deps.permissions.requestCapabilities(CAPABILITIES);
      const denied = CAPABILITIES.find(capability => grants[capability] === 'denied');
      if (denied) {
        return this.halt(PRESENCE_ERROR_CODES.PERMISSION_DENIED, permissionDeniedStatus(denied));
      }
    } catch (error) {
      return this.halt(PRESENCE_ERROR_CODES.PERMISSION_DENIED, `Permission request failed: ${describeRadioError(error)}`);
    }

    const poweredOn = await this.deps.radio.waitForPoweredOn(this.options.radioReadyTimeoutMs);
    if (!poweredOn) {
      return this.halt(PRESENCE_ERROR_CODES.RADIO_OFF, STATUS_MESSAGES.RADIO_OFF);
    }

    const wasHalted = this.halted;
    this.halted = false;
    if (wasHalted) {
      this.logger.info('Capabilities restored, automated actions re-enabled');
      if (this.lostModeActive) {
        this.armReconnectLoop();
      }
    }
    return true;
  }

  private halt(code: PresenceErrorCode, message: string): false {
    this.halted = true;
    this.recordError(code, message);
    this.setStatus(message);
    return false;
  }

  // === Scan sessions ===

  private async tryBondedReconnect(context: string): Promise<boolean> {
    if (this.machine.getState() !== PresencePhase.IDLE) {
      return false;
    }

    const bondedId = await this.loadBondedId();
    if (!bondedId) {
      this.logger.debug(`No bonded umbrella (${context}), staying idle`);
      return false;
    }
    if (this.machine.getState() !== PresencePhase.IDLE || this.disposed) {
      return false;
    }

    this.setStatus(STATUS_MESSAGES.AUTO_RECONNECT_SCANNING);
    await this.runScanSession('startup', bondedId, this.options.autoScanMs);
    return true;
  }

  private async runScanSession(origin: ScanOrigin, targetId: string | null, durationMs: number): Promise<void> {
    this.cancelSession('superseded');

    const session: ScanSession = {
      id: ++this.sessionSeq,
      origin,
      targetId,
      timer: null,
      active: true
    };
    this.session = session;

    if (this.machine.getState() === PresencePhase.IDLE) {
      this.enterPhase(PresencePhase.SCANNING, `${origin} scan`);
    }

    session.timer = setTimeout(() => {
      this.finishSession(session).catch(error => {
        this.logger.error(`Failed to finish scan session #${session.id}:`, error);
      });
    }, durationMs);

    try {
      await this.deps.radio.stopScan();
      if (!this.isCurrent(session)) {
        return;
      }
      await this.deps.radio.startScan(sighting => this.handleSighting(session, sighting));
      this.logger.info(
        `Scan session #${session.id} (${origin}) running for ${durationMs}ms` +
        (targetId ? `, looking for ${targetId}` : '')
      );
    } catch (error) {
      if (!this.isCurrent(session)) {
        return;
      }
      this.endSession(session);

      const reason = describeRadioError(error);
      this.recordError(PRESENCE_ERROR_CODES.SCAN_FAILURE, reason);
      if (this.machine.getState() === PresencePhase.SCANNING) {
        this.enterPhase(PresencePhase.IDLE, 'scan failed');
      }
      this.setStatus(scanFailedStatus(reason));
    }
  }

  private handleSighting(session: ScanSession, sighting: Sighting): void {
    if (!this.isCurrent(session)) {
      return;
    }

    const entry = this.registry.upsert(sighting);
    if (!entry) {
      return;
    }
    this.emitDevices();

    if (session.targetId === null || entry.id !== session.targetId) {
      return;
    }

    // Target found: the session ends here and later sightings are dropped
    this.endSession(session);
    void this.stopRadioScan();
    this.emitSessionEnded(session, true);
    this.logger.info(`Bonded umbrella ${entry.id} sighted (rssi ${entry.signalStrength})`);

    if (!this.sessionStillWanted(session)) {
      this.logger.info(`Discarding sighting from ${session.origin} session #${session.id}: controller is ${this.machine.getState()}`);
      return;
    }

    this.attemptConnect(entry.id).catch(error => {
      this.logger.error(`Connect to ${entry.id} crashed:`, error);
    });
  }

  private async finishSession(session: ScanSession): Promise<void> {
    if (!this.isCurrent(session)) {
      return;
    }
    this.endSession(session);
    await this.stopRadioScan();
    this.emitSessionEnded(session, false);

    const summary = this.registry.size === 0
      ? STATUS_MESSAGES.NO_UMBRELLAS_FOUND
      : STATUS_MESSAGES.SELECT_TO_CONNECT;

    if (this.machine.getState() === PresencePhase.SCANNING) {
      this.enterPhase(PresencePhase.IDLE, 'scan window elapsed');
      this.setStatus(summary);
    } else if (session.origin === 'manual' && this.machine.getState() !== PresencePhase.LOST) {
      this.setStatus(summary);
    } else {
      this.logger.debug(`Scan session #${session.id} (${session.origin}) ended without sighting ${session.targetId}`);
    }
  }

  private sessionStillWanted(session: ScanSession): boolean {
    const phase = this.machine.getState();
    switch (session.origin) {
      case 'reconnect':
        return phase === PresencePhase.LOST;
      case 'startup':
        return phase === PresencePhase.SCANNING;
      case 'manual':
        return false;
    }
  }

  private isCurrent(session: ScanSession): boolean {
    return this.session === session && session.active;
  }

  /** Synchronous half of cancellation; the radio is stopped by the caller */
  private cancelSession(reason: string): boolean {
    const session = this.session;
    if (!session) {
      return false;
    }
    this.endSession(session);
    this.logger.debug(`Scan session #${session.id} cancelled (${reason})`);
    return true;
  }

  private endSession(session: ScanSession): void {
    session.active = false;
    if (session.timer) {
      clearTimeout(session.timer);
      session.timer = null;
    }
    if (this.session === session) {
      this.session = null;
    }
  }

  private async stopRadioScan(): Promise<void> {
    try {
      await this.deps.radio.stopScan();
    } catch (error) {
      this.logger.warn(`Failed to stop scanning: ${describeRadioError(error)}`);
    }
  }

  // === Connection ===

  private isConnectBusy(): boolean {
    return this.connectInFlight !== null || this.machine.getState() === PresencePhase.CONNECTING;
  }

  private async attemptConnect(deviceId: string): Promise<boolean> {
    if (this.connectInFlight) {
      this.logger.warn(`Ignoring connect to ${deviceId}: attempt to ${this.connectInFlight} still in flight`);
      return false;
    }

    // From LOST the phase is kept until the link is back so the loops keep running
    const fromLost = this.machine.getState() === PresencePhase.LOST;
    const generation = ++this.connectGeneration;
    this.connectInFlight = deviceId;

    if (fromLost) {
      this.setStatus(STATUS_MESSAGES.RECONNECTING);
    } else {
      this.enterPhase(PresencePhase.CONNECTING, `connecting to ${deviceId}`, deviceId);
      this.setStatus(STATUS_MESSAGES.CONNECTING);
    }

    try {
      await this.deps.radio.connect(deviceId, this.options.connectTimeoutMs);
    } catch (error) {
      this.connectInFlight = null;
      this.handleConnectFailure(deviceId, generation, fromLost, error);
      return false;
    }
    this.connectInFlight = null;

    if (generation !== this.connectGeneration) {
      this.logger.info(`Discarding late connection to ${deviceId}: user moved on`);
      await this.dropLink(deviceId);
      return false;
    }

    this.unwatch();
    this.enterPhase(PresencePhase.CONNECTED, fromLost ? 'reconnected' : 'connected', deviceId);
    this.unwatchLink = this.deps.radio.watchConnection(deviceId, state => this.handleLinkState(deviceId, state));
    this.lastError = null;
    this.setStatus(connectedStatus(this.nameOf(deviceId)));

    await this.persistBond(deviceId);
    return true;
  }

  private handleConnectFailure(deviceId: string, generation: number, fromLost: boolean, error: unknown): void {
    const reason = describeRadioError(error);
    this.logger.warn(`Connect to ${deviceId} failed: ${reason}`);

    if (generation !== this.connectGeneration) {
      return;
    }
    this.recordError(PRESENCE_ERROR_CODES.CONNECT_FAILURE, reason);

    if (fromLost) {
      if (this.machine.getState() === PresencePhase.LOST) {
        this.setStatus(reconnectFailedStatus(reason));
      }
      return;
    }

    if (this.machine.getState() === PresencePhase.CONNECTING) {
      this.enterPhase(PresencePhase.IDLE, 'connect failed');
    }
    this.setStatus(connectFailedStatus(reason));
  }

  private handleLinkState(deviceId: string, state: LinkState): void {
    if (deviceId !== this.activeDeviceId || this.machine.getState() !== PresencePhase.CONNECTED) {
      return;
    }
    if (state === 'connected') {
      this.logger.debug(`Link to ${deviceId} confirmed`);
      return;
    }

    this.unwatch();
    this.enterPhase(PresencePhase.LOST, `link to ${deviceId} dropped`);
    this.setStatus(STATUS_MESSAGES.UMBRELLA_LOST);
  }

  /**
   * One reconnect-loop tick: a short scan for the bonded umbrella.
   * A previous reconnect scan still running is replaced; a user scan is left alone.
   */
  private async attemptReconnect(): Promise<void> {
    if (!this.reconnectTickAllowed()) {
      return;
    }

    const bondedId = await this.loadBondedId();
    // A disconnect event or user action may have landed while the store was read
    if (!this.reconnectTickAllowed()) {
      return;
    }
    if (!bondedId) {
      this.logger.info('Bonded umbrella forgotten, stopping reconnect loop');
      this.reconnectLoop.disarm();
      return;
    }

    await this.runScanSession('reconnect', bondedId, this.options.reconnectScanMs);
  }

  private reconnectTickAllowed(): boolean {
    if (this.machine.getState() !== PresencePhase.LOST || this.halted) {
      return false;
    }
    if (this.connectInFlight) {
      this.logger.debug('Reconnect tick skipped: connect already in flight');
      return false;
    }
    if (this.session && this.session.origin !== 'reconnect') {
      this.logger.debug(`Reconnect tick skipped: ${this.session.origin} scan in progress`);
      return false;
    }
    return true;
  }

  private unwatch(): void {
    if (this.unwatchLink) {
      this.unwatchLink();
      this.unwatchLink = null;
    }
  }

  private async dropLink(deviceId: string): Promise<void> {
    try {
      await this.deps.radio.disconnect(deviceId);
    } catch (error) {
      this.logger.warn(`Disconnect from ${deviceId} failed: ${describeRadioError(error)}`);
    }
  }

  // === Persistence ===

  private async loadBondedId(): Promise<string | null> {
    try {
      return await this.deps.bondStore.load();
    } catch (error) {
      this.logger.error('Failed to read bonded umbrella:', error);
      return null;
    }
  }

  private async persistBond(deviceId: string): Promise<void> {
    try {
      await this.deps.bondStore.save(deviceId);
      this.logger.info(`Bonded umbrella saved: ${deviceId}`);
    } catch (error) {
      this.logger.error(`Failed to save bonded umbrella ${deviceId}:`, error);
    }
  }

  // === Notifications ===

  private nameOf(deviceId: string): string {
    return this.registry.get(deviceId)?.displayName ?? deviceId;
  }

  private recordError(code: PresenceErrorCode, message: string): void {
    this.lastError = { code, message };
  }

  private setStatus(message: string): void {
    this.status = message;
    this.logger.info(`Status: ${message}`);
    this.emit('status', message, this.machine.getState());
  }

  private emitDevices(): void {
    this.emit('devices', this.registry.snapshot());
  }

  private emitSessionEnded(session: ScanSession, matched: boolean): void {
    const summary: SessionSummary = {
      sessionId: session.id,
      origin: session.origin,
      discovered: this.registry.size,
      matched
    };
    this.emit('sessionEnded', summary);
  }
}
