export { PresenceController } from './presence-controller.js';
export type {
  PresenceControllerOptions,
  PresenceDependencies,
  PresenceSnapshot,
  ScanOrigin,
  SessionSummary
} from './presence-controller.js';
export { PresencePhase, StateMachine } from './state-machine.js';
export { DeviceRegistry, resolveDisplayName, type DiscoveredDevice } from './device-registry.js';
export { LostAlertLoop } from './lost-alert-loop.js';
export { ReconnectLoop } from './reconnect-loop.js';
export { PeriodicTask } from './periodic-task.js';
export type { RadioLayer, Sighting, LinkState } from './radio.js';
export { MockRadio, type ConnectBehavior } from './mock-radio.js';
export { BondStore, FileKeyValueStore, MemoryKeyValueStore, type KeyValueStore } from './bond-store.js';
export { TerminalAlertDispatcher, type Alert, type AlertDispatcher } from './alert-dispatcher.js';
export { AdapterPermissionGate, StaticPermissionGate, type PermissionGate, type CapabilityGrants } from './permission-gate.js';
export { PresenceError, PRESENCE_ERROR_CODES, describeRadioError, type PresenceErrorCode } from './errors.js';
export { STATUS_MESSAGES, ALERT_TEXT, DEFAULT_NAME_PREFIX, type Capability } from './constants.js';
export { loadConfig, type AppConfig } from './config.js';
export { StatusLog, type StatusEntry } from './status-log.js';
export { PeripheralCache } from './peripheral-cache.js';
export { ControlServer } from './control-server.js';
export { createToolHandlers, registerMcpTools, toolRegistry } from './mcp-tools.js';
export { createMcpHttpApp, closeMcpSessions } from './mcp-http-transport.js';
export { normalizeLogLevel, type LogLevel } from './utils.js';
export { Logger } from './logger.js';
// NobleRadio is not re-exported: importing it loads the native Bluetooth binding
