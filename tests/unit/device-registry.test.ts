import { describe, it, expect, beforeEach } from 'vitest';
import { DeviceRegistry, resolveDisplayName } from '../../src/device-registry.js';
import type { Sighting } from '../../src/radio.js';

function sighting(id: string, advertisedName: string, rssi: number, platformName = ''): Sighting {
  return { id, advertisedName, platformName, rssi };
}

describe('resolveDisplayName', () => {
  it('prefers the advertised name', () => {
    expect(resolveDisplayName('Smart Umbrella A', 'Cached')).toBe('Smart Umbrella A');
  });

  it('falls back to the platform name, then to Unknown', () => {
    expect(resolveDisplayName('', 'Smart Umbrella B')).toBe('Smart Umbrella B');
    expect(resolveDisplayName('', '')).toBe('Unknown');
  });
});

describe('DeviceRegistry', () => {
  let registry: DeviceRegistry;

  beforeEach(() => {
    registry = new DeviceRegistry('Smart Umbrella');
  });

  it('keeps only names starting with the prefix', () => {
    expect(registry.upsert(sighting('aa', 'Smart Umbrella 1', -60))).toEqual({
      id: 'aa',
      displayName: 'Smart Umbrella 1',
      signalStrength: -60
    });
    expect(registry.upsert(sighting('bb', 'Headphones', -40))).toBeNull();
    expect(registry.upsert(sighting('cc', '', -40))).toBeNull(); // resolves to Unknown
    expect(registry.upsert(sighting('dd', 'smart umbrella', -40))).toBeNull(); // case-sensitive

    expect(registry.size).toBe(1);
  });

  it('matches on the platform name when nothing is advertised', () => {
    const entry = registry.upsert(sighting('ee', '', -70, 'Smart Umbrella Cached'));
    expect(entry?.displayName).toBe('Smart Umbrella Cached');
  });

  it('replaces an entry when the same id is sighted again', () => {
    registry.upsert(sighting('aa', 'Smart Umbrella 1', -80));
    registry.upsert(sighting('aa', 'Smart Umbrella 1', -55));

    expect(registry.size).toBe(1);
    expect(registry.get('aa')?.signalStrength).toBe(-55);
  });

  it('sorts the snapshot by descending signal strength', () => {
    registry.upsert(sighting('weak', 'Smart Umbrella W', -90));
    registry.upsert(sighting('strong', 'Smart Umbrella S', -40));
    registry.upsert(sighting('mid', 'Smart Umbrella M', -65));

    expect(registry.snapshot().map(d => d.id)).toEqual(['strong', 'mid', 'weak']);
  });

  it('keeps first-seen order for equal signal strength', () => {
    registry.upsert(sighting('first', 'Smart Umbrella 1', -60));
    registry.upsert(sighting('second', 'Smart Umbrella 2', -60));
    registry.upsert(sighting('first', 'Smart Umbrella 1', -60));

    expect(registry.snapshot().map(d => d.id)).toEqual(['first', 'second']);
  });

  it('returns copies from snapshot()', () => {
    registry.upsert(sighting('aa', 'Smart Umbrella 1', -60));
    const [copy] = registry.snapshot();
    copy.signalStrength = 0;

    expect(registry.get('aa')?.signalStrength).toBe(-60);
  });

  it('clear() empties the registry', () => {
    registry.upsert(sighting('aa', 'Smart Umbrella 1', -60));
    registry.clear();

    expect(registry.size).toBe(0);
    expect(registry.snapshot()).toEqual([]);
  });
});
