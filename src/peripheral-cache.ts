/**
 * Peripherals sighted by the radio, most recently seen last.
 *
 * Scanning with duplicates runs for the life of the service, so the cache is
 * bounded: past `capacity` the least recently seen entry is dropped, unless it
 * is linked, being linked, or pinned by a connection watcher.
 */
export class PeripheralCache<P extends { state: string }> {
  private entries = new Map<string, P>();
  private pins = new Map<string, number>();

  constructor(private readonly capacity: number) {}

  remember(id: string, peripheral: P): void {
    this.entries.delete(id);
    this.entries.set(id, peripheral);
    this.evict();
  }

  get(id: string): P | undefined {
    return this.entries.get(id);
  }

  /** Keeps the entry until the returned release function runs */
  pin(id: string): () => void {
    this.pins.set(id, (this.pins.get(id) ?? 0) + 1);
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const count = (this.pins.get(id) ?? 1) - 1;
      if (count > 0) {
        this.pins.set(id, count);
      } else {
        this.pins.delete(id);
      }
    };
  }

  values(): Iterable<P> {
    return this.entries.values();
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
    this.pins.clear();
  }

  private evict(): void {
    if (this.entries.size <= this.capacity) {
      return;
    }
    for (const [id, peripheral] of this.entries) {
      if (this.entries.size <= this.capacity) {
        return;
      }
      if (this.isHeld(id, peripheral)) {
        continue;
      }
      this.entries.delete(id);
    }
  }

  private isHeld(id: string, peripheral: P): boolean {
    return this.pins.has(id) || peripheral.state === 'connected' || peripheral.state === 'connecting';
  }
}
