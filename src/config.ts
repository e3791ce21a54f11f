import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { DEFAULT_NAME_PREFIX } from './constants.js';
import type { PresenceControllerOptions } from './presence-controller.js';
import { normalizeLogLevel, type LogLevel } from './utils.js';

export interface HttpConfig {
  host: string;
  port: number;
  token?: string;
}

export interface AppConfig {
  presence: PresenceControllerOptions;
  storePath: string;
  http: HttpConfig;
  stdioDisabled: boolean;
  mockRadio: boolean;
  alertBell: boolean;
  statusLogSize: number;
  logLevel: LogLevel;
}

const STATUS_LOG_MIN = 10;
const STATUS_LOG_MAX = 10000;

// Blank variables count as unset
const blankAsUnset = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const duration = (fallback: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(fallback));

const flag = (fallback: boolean) =>
  z.preprocess(
    blankAsUnset,
    z.enum(['true', 'false', '1', '0']).default(fallback ? 'true' : 'false')
  ).transform(value => value === 'true' || value === '1');

const optionalText = z.preprocess(blankAsUnset, z.string().optional());

const envSchema = z.object({
  UMBRELLA_NAME_PREFIX: z.preprocess(blankAsUnset, z.string().default(DEFAULT_NAME_PREFIX)),
  UMBRELLA_MANUAL_SCAN_MS: duration(10000),
  UMBRELLA_AUTO_SCAN_MS: duration(6000),
  UMBRELLA_RECONNECT_SCAN_MS: duration(4000),
  UMBRELLA_RECONNECT_INTERVAL_MS: duration(3000),
  UMBRELLA_ALERT_INTERVAL_MS: duration(3000),
  UMBRELLA_CONNECT_TIMEOUT_MS: duration(10000),
  UMBRELLA_RADIO_READY_TIMEOUT_MS: duration(5000),
  UMBRELLA_STORE_PATH: optionalText,
  UMBRELLA_HTTP_HOST: z.preprocess(blankAsUnset, z.string().default('127.0.0.1')),
  UMBRELLA_HTTP_PORT: z.preprocess(blankAsUnset, z.coerce.number().int().min(1).max(65535).default(8081)),
  UMBRELLA_HTTP_TOKEN: optionalText,
  UMBRELLA_STDIO_DISABLED: flag(false),
  UMBRELLA_MOCK_RADIO: flag(false),
  UMBRELLA_ALERT_BELL: flag(true),
  UMBRELLA_STATUS_LOG_SIZE: z.preprocess(blankAsUnset, z.coerce.number().int().default(500)),
  UMBRELLA_LOG_LEVEL: optionalText
});

export function defaultStorePath(): string {
  return join(homedir(), '.umbrella-watch', 'state.json');
}

/**
 * Read and validate the UMBRELLA_* environment. Throws on the first bad value set.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    presence: {
      namePrefix: vars.UMBRELLA_NAME_PREFIX,
      manualScanMs: vars.UMBRELLA_MANUAL_SCAN_MS,
      autoScanMs: vars.UMBRELLA_AUTO_SCAN_MS,
      reconnectScanMs: vars.UMBRELLA_RECONNECT_SCAN_MS,
      reconnectIntervalMs: vars.UMBRELLA_RECONNECT_INTERVAL_MS,
      alertIntervalMs: vars.UMBRELLA_ALERT_INTERVAL_MS,
      connectTimeoutMs: vars.UMBRELLA_CONNECT_TIMEOUT_MS,
      radioReadyTimeoutMs: vars.UMBRELLA_RADIO_READY_TIMEOUT_MS
    },
    storePath: vars.UMBRELLA_STORE_PATH ?? defaultStorePath(),
    http: {
      host: vars.UMBRELLA_HTTP_HOST,
      port: vars.UMBRELLA_HTTP_PORT,
      token: vars.UMBRELLA_HTTP_TOKEN
    },
    stdioDisabled: vars.UMBRELLA_STDIO_DISABLED,
    mockRadio: vars.UMBRELLA_MOCK_RADIO,
    alertBell: vars.UMBRELLA_ALERT_BELL,
    statusLogSize: Math.min(STATUS_LOG_MAX, Math.max(STATUS_LOG_MIN, vars.UMBRELLA_STATUS_LOG_SIZE)),
    logLevel: normalizeLogLevel(vars.UMBRELLA_LOG_LEVEL)
  };
}
