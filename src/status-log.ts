import { Logger } from './logger.js';
import type { PresencePhase } from './state-machine.js';
import { parseDuration } from './utils.js';

export interface StatusEntry {
  id: number;              // Global sequence number
  timestamp: string;       // ISO timestamp
  phase: PresencePhase;    // Phase when the message was set
  message: string;
}

export class StatusLog {
  private buffer: StatusEntry[] = [];
  private sequenceCounter = 0;
  private logger = new Logger('StatusLog');

  constructor(private readonly maxSize: number) {
    this.logger.debug(`Initialized with max size: ${this.maxSize} entries`);
  }

  push(phase: PresencePhase, message: string): StatusEntry {
    const entry: StatusEntry = {
      id: this.sequenceCounter++,
      timestamp: new Date().toISOString(),
      phase,
      message
    };

    this.buffer.push(entry);

    // Maintain circular buffer size
    while (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }

    return entry;
  }

  /**
   * @param since 'all', a duration ('30s', '5m', '1h') or an ISO timestamp
   */
  getEntriesSince(since: string, limit: number): StatusEntry[] {
    const startIdx = this.parseSince(since);
    if (startIdx === -1) {
      return [];
    }
    return this.buffer.slice(startIdx, startIdx + limit);
  }

  latest(): StatusEntry | null {
    return this.buffer.length > 0 ? this.buffer[this.buffer.length - 1] : null;
  }

  get size(): number {
    return this.buffer.length;
  }

  // Index of the first entry to return, -1 when nothing qualifies
  private parseSince(since: string): number {
    if (since === 'all') {
      return this.buffer.length > 0 ? 0 : -1;
    }

    const durationMs = parseDuration(since);
    const cutoffTime = durationMs !== null ? Date.now() - durationMs : new Date(since).getTime();
    if (Number.isNaN(cutoffTime)) {
      throw new Error(`Invalid 'since' value: ${since}`);
    }

    return this.buffer.findIndex(e => new Date(e.timestamp).getTime() > cutoffTime);
  }
}
