import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { StatusLog } from '../../src/status-log.js';
import { PresencePhase } from '../../src/state-machine.js';

describe('StatusLog', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T08:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('numbers entries and stamps them', () => {
    const log = new StatusLog(10);
    const entry = log.push(PresencePhase.SCANNING, 'Scanning...');

    expect(entry).toEqual({
      id: 0,
      timestamp: '2026-03-01T08:00:00.000Z',
      phase: PresencePhase.SCANNING,
      message: 'Scanning...'
    });
    expect(log.push(PresencePhase.IDLE, 'No umbrellas found').id).toBe(1);
    expect(log.latest()?.message).toBe('No umbrellas found');
  });

  it('drops the oldest entries beyond its size', () => {
    const log = new StatusLog(3);
    for (let i = 0; i < 5; i++) {
      log.push(PresencePhase.IDLE, `message ${i}`);
    }

    expect(log.size).toBe(3);
    expect(log.getEntriesSince('all', 10).map(e => e.id)).toEqual([2, 3, 4]);
  });

  it('honours the limit', () => {
    const log = new StatusLog(10);
    for (let i = 0; i < 5; i++) {
      log.push(PresencePhase.IDLE, `message ${i}`);
    }

    expect(log.getEntriesSince('all', 2).map(e => e.message)).toEqual(['message 0', 'message 1']);
  });

  it('filters by duration and by ISO timestamp', () => {
    const log = new StatusLog(10);
    log.push(PresencePhase.CONNECTED, 'Connected (Smart Umbrella 1)');
    vi.advanceTimersByTime(60_000);
    log.push(PresencePhase.LOST, 'Umbrella Lost');

    expect(log.getEntriesSince('30s', 10).map(e => e.message)).toEqual(['Umbrella Lost']);
    expect(log.getEntriesSince('2m', 10)).toHaveLength(2);
    expect(log.getEntriesSince('2026-03-01T08:00:30.000Z', 10).map(e => e.message)).toEqual(['Umbrella Lost']);
  });

  it('returns nothing when no entry is newer than the cutoff', () => {
    const log = new StatusLog(10);
    log.push(PresencePhase.IDLE, 'Not Connected');
    vi.advanceTimersByTime(60_000);

    expect(log.getEntriesSince('30s', 10)).toEqual([]);
    expect(new StatusLog(10).getEntriesSince('all', 10)).toEqual([]);
  });

  it('rejects an unreadable since value', () => {
    const log = new StatusLog(10);

    expect(() => log.getEntriesSince('soon', 10)).toThrow("Invalid 'since' value: soon");
  });

});
