import { readFileSync } from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export function normalizeLogLevel(level: string | undefined): LogLevel {
  const normalized = (level || 'info').toLowerCase();

  switch (normalized) {
    case 'debug':
    case 'verbose':
    case 'trace':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
    case 'warning':
      return 'warn';
    case 'error':
      return 'error';
    default:
      console.warn(`[Config] Unknown log level '${level}', defaulting to info`);
      return 'info';
  }
}

export interface PackageMetadata {
  name: string;
  version: string;
  description: string;
}

let cachedMetadata: PackageMetadata | null = null;

export function getPackageMetadata(): PackageMetadata {
  if (!cachedMetadata) {
    const packageJsonPath = new URL('../package.json', import.meta.url);
    const pkg: Partial<PackageMetadata> = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    cachedMetadata = {
      name: pkg.name ?? 'umbrella-watch',
      version: pkg.version ?? '0.0.0',
      description: pkg.description ?? ''
    };
  }
  return cachedMetadata;
}

/**
 * Races a promise against a timer. The timer is always cleared once the race settles;
 * tearing down the work that lost the race is left to the caller.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  message = 'Operation timeout'
): Promise<T> {
  const handle: { timer?: NodeJS.Timeout } = {};

  const expiry = new Promise<never>((_, reject) => {
    handle.timer = setTimeout(() => reject(new Error(message)), timeoutMs);
  });

  try {
    return await Promise.race([promise, expiry]);
  } finally {
    clearTimeout(handle.timer);
  }
}

/**
 * Parse '30s' / '5m' / '1h' into milliseconds, or null when the string is not a duration
 */
export function parseDuration(value: string): number | null {
  const match = value.match(/^(\d+)(ms|s|m|h)$/);
  if (!match) {
    return null;
  }
  const [, amount, unit] = match;
  const multipliers: Record<string, number> = { ms: 1, s: 1000, m: 60000, h: 3600000 };
  return parseInt(amount, 10) * multipliers[unit];
}
