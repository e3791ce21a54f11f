import { describe, it, expect, beforeEach } from 'vitest';
import { PeripheralCache } from '../../src/peripheral-cache.js';

interface FakePeripheral {
  state: string;
}

function idle(): FakePeripheral {
  return { state: 'disconnected' };
}

describe('PeripheralCache', () => {
  let cache: PeripheralCache<FakePeripheral>;

  beforeEach(() => {
    cache = new PeripheralCache<FakePeripheral>(3);
  });

  it('drops the least recently seen entry past capacity', () => {
    cache.remember('a', idle());
    cache.remember('b', idle());
    cache.remember('c', idle());
    cache.remember('d', idle());

    expect(cache.size).toBe(3);
    expect(cache.get('a')).toBeUndefined();
    expect(cache.get('d')).toBeDefined();
  });

  it('treats a repeated sighting as recent', () => {
    cache.remember('a', idle());
    cache.remember('b', idle());
    cache.remember('c', idle());
    cache.remember('a', idle());
    cache.remember('d', idle());

    expect(cache.get('a')).toBeDefined();
    expect(cache.get('b')).toBeUndefined();
  });

  it('keeps linked and linking peripherals', () => {
    cache.remember('a', { state: 'connected' });
    cache.remember('b', { state: 'connecting' });
    cache.remember('c', idle());
    cache.remember('d', idle());

    expect(cache.get('a')).toBeDefined();
    expect(cache.get('b')).toBeDefined();
    expect(cache.get('c')).toBeUndefined();
  });

  it('keeps a pinned peripheral until it is released', () => {
    cache.remember('a', idle());
    const release = cache.pin('a');
    cache.remember('b', idle());
    cache.remember('c', idle());
    cache.remember('d', idle());

    expect(cache.get('a')).toBeDefined();
    expect(cache.get('b')).toBeUndefined();

    release();
    release();
    cache.remember('e', idle());

    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(3);
  });

  it('stays bounded over a long stream of distinct sightings', () => {
    for (let i = 0; i < 1000; i++) {
      cache.remember(`dev-${i}`, idle());
    }

    expect(cache.size).toBe(3);
    expect([...cache.values()]).toHaveLength(3);
    expect(cache.get('dev-999')).toBeDefined();
  });
});
