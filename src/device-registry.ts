import { FALLBACK_DEVICE_NAME } from './constants.js';
import type { Sighting } from './radio.js';

export interface DiscoveredDevice {
  id: string;
  displayName: string;
  signalStrength: number;
}

export function resolveDisplayName(advertisedName: string, platformName: string): string {
  if (advertisedName) return advertisedName;
  if (platformName) return platformName;
  return FALLBACK_DEVICE_NAME;
}

/**
 * Devices seen during scan sessions whose name matches the prefix filter.
 *
 * Map insertion order doubles as the tie-breaker when sorting: overwriting an
 * entry keeps its original position.
 */
export class DeviceRegistry {
  private entries = new Map<string, DiscoveredDevice>();

  constructor(private readonly namePrefix: string) {}

  clear(): void {
    this.entries.clear();
  }

  /**
   * Returns the stored entry, or null when the sighting was filtered out
   */
  upsert(sighting: Sighting): DiscoveredDevice | null {
    const displayName = resolveDisplayName(sighting.advertisedName, sighting.platformName);
    if (!displayName.startsWith(this.namePrefix)) {
      return null;
    }

    const entry: DiscoveredDevice = {
      id: sighting.id,
      displayName,
      signalStrength: sighting.rssi
    };
    this.entries.set(sighting.id, entry);
    return entry;
  }

  /** Strongest signal first */
  snapshot(): DiscoveredDevice[] {
    return [...this.entries.values()]
      .map(entry => ({ ...entry }))
      .sort((a, b) => b.signalStrength - a.signalStrength);
  }

  get(id: string): DiscoveredDevice | undefined {
    return this.entries.get(id);
  }

  get size(): number {
    return this.entries.size;
  }
}
