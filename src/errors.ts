import { readFileSync } from 'fs';

export const PRESENCE_ERROR_CODES = {
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  RADIO_OFF: 'RADIO_OFF',
  CONNECT_FAILURE: 'CONNECT_FAILURE',
  SCAN_FAILURE: 'SCAN_FAILURE',
  UNKNOWN_DEVICE: 'UNKNOWN_DEVICE'
} as const;

export type PresenceErrorCode = typeof PRESENCE_ERROR_CODES[keyof typeof PRESENCE_ERROR_CODES];

/**
 * Presence error class for typed error handling
 */
export class PresenceError extends Error {
  constructor(
    public readonly code: PresenceErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'PresenceError';
  }
}

let hciErrorCodes: Record<string, string> | null = null;

// Bluetooth HCI status codes, based on the Bluetooth Core Specification
function loadHciErrorCodes(): Record<string, string> {
  if (!hciErrorCodes) {
    const tablePath = new URL('../data/hci-error-codes.json', import.meta.url);
    hciErrorCodes = JSON.parse(readFileSync(tablePath, 'utf-8'));
  }
  return hciErrorCodes ?? {};
}

function lookupHciCode(code: number): string {
  return loadHciErrorCodes()[String(code)] || `Unknown Bluetooth error code: ${code}`;
}

function hasMessage(value: unknown): value is { message: string } {
  return typeof value === 'object' && value !== null && 'message' in value
    && typeof value.message === 'string' && value.message.length > 0;
}

function hasNumericCode(value: unknown): value is { code: number } {
  return typeof value === 'object' && value !== null && 'code' in value
    && typeof value.code === 'number';
}

/**
 * Turn whatever the radio stack threw into a short human-readable reason
 */
export function describeRadioError(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }

  if (typeof error === 'number') {
    return lookupHciCode(error);
  }

  if (hasMessage(error)) {
    return error.message;
  }

  if (hasNumericCode(error)) {
    return lookupHciCode(error.code);
  }

  // Try to extract error code from string representation
  const errorStr = error === null || error === undefined ? '' : String(error);
  const codeMatch = errorStr.match(/\b(\d+)\b/);
  if (codeMatch) {
    const table = loadHciErrorCodes();
    const known = table[String(parseInt(codeMatch[1], 10))];
    if (known) {
      return known;
    }
  }

  return errorStr || 'Unknown error';
}
