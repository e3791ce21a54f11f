/**
 * Radio layer contract consumed by the presence controller.
 *
 * Implementations only move bytes between the adapter and the controller:
 * no retries, no state, no name filtering.
 */

export interface Sighting {
  id: string;              // Platform address / UUID, stable across sessions
  advertisedName: string;  // Local name from the advertisement, may be empty
  platformName: string;    // Name the OS cached for the device, may be empty
  rssi: number;
}

export type SightingListener = (sighting: Sighting) => void;

export type LinkState = 'connected' | 'disconnected';

export type LinkStateListener = (state: LinkState) => void;

export interface RadioLayer {
  /** Resolves false when the adapter is not powered on within the timeout */
  waitForPoweredOn(timeoutMs: number): Promise<boolean>;

  /** Replaces any previous listener; sightings flow until stopScan() */
  startScan(listener: SightingListener): Promise<void>;

  stopScan(): Promise<void>;

  /** Rejects on timeout, radio error or rejection and leaves no half-open link behind */
  connect(deviceId: string, timeoutMs: number): Promise<void>;

  disconnect(deviceId: string): Promise<void>;

  /** Returns the unsubscribe function */
  watchConnection(deviceId: string, listener: LinkStateListener): () => void;
}
