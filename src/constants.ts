/**
 * User-visible literals for the presence monitor
 */

export const DEFAULT_NAME_PREFIX = 'Smart Umbrella';
export const FALLBACK_DEVICE_NAME = 'Unknown';
export const BONDED_UMBRELLA_KEY = 'bonded_umbrella_id';

export const STATUS_MESSAGES = {
  NOT_CONNECTED: 'Not Connected',
  SCANNING: 'Scanning...',
  AUTO_RECONNECT_SCANNING: 'Auto reconnect scanning...',
  NO_UMBRELLAS_FOUND: 'No umbrellas found',
  SELECT_TO_CONNECT: 'Select umbrella to connect',
  CONNECTING: 'Connecting...',
  RECONNECTING: 'Reconnecting...',
  UMBRELLA_LOST: 'Umbrella Lost',
  BOND_CLEARED: 'Saved umbrella cleared',
  RADIO_OFF: 'Bluetooth OFF. Turn it ON.',
  BUSY_CONNECTING: 'Already connecting, please wait',
  ALREADY_CONNECTED: 'Already connected, disconnect first'
} as const;

export const ALERT_TEXT = {
  TITLE: 'Umbrella Alert',
  FIRST_BODY: 'Umbrella disconnected! You left it behind.',
  REPEAT_BODY: 'Umbrella still missing'
} as const;

export type Capability = 'scan' | 'connect' | 'location' | 'notify';

// Checked in this order; the first denial is the one reported
export const CAPABILITIES: readonly Capability[] = ['scan', 'connect', 'location', 'notify'];

export const CAPABILITY_LABELS: Record<Capability, string> = {
  scan: 'BLUETOOTH_SCAN',
  connect: 'BLUETOOTH_CONNECT',
  location: 'LOCATION',
  notify: 'NOTIFICATIONS'
};

export function connectedStatus(deviceName: string): string {
  return `Connected (${deviceName})`;
}

export function connectFailedStatus(reason: string): string {
  return `Connect failed: ${reason}`;
}

export function reconnectFailedStatus(reason: string): string {
  return `Reconnect failed: ${reason}`;
}

export function scanFailedStatus(reason: string): string {
  return `Scan failed: ${reason}`;
}

export function permissionDeniedStatus(capability: Capability): string {
  return `Permission denied: ${CAPABILITY_LABELS[capability]}`;
}
