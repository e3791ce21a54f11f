import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { BONDED_UMBRELLA_KEY } from './constants.js';
import { Logger } from './logger.js';

export interface KeyValueStore {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
}

export class MemoryKeyValueStore implements KeyValueStore {
  private values = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  async get(key: string): Promise<string | undefined> {
    return this.values.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * String map persisted as one JSON object. Writes go to a temp file first and are
 * renamed over the target so a crash never leaves a truncated file behind.
 */
export class FileKeyValueStore implements KeyValueStore {
  private logger = new Logger('FileStore');

  constructor(private readonly filePath: string) {}

  async get(key: string): Promise<string | undefined> {
    const values = await this.readAll();
    return values[key];
  }

  async set(key: string, value: string): Promise<void> {
    const values = await this.readAll();
    values[key] = value;
    await this.writeAll(values);
  }

  async delete(key: string): Promise<void> {
    const values = await this.readAll();
    if (!(key in values)) {
      return;
    }
    delete values[key];
    await this.writeAll(values);
  }

  private async readAll(): Promise<Record<string, string>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    const values: Record<string, string> = {};
    if (typeof parsed === 'object' && parsed !== null) {
      for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === 'string') {
          values[key] = value;
        }
      }
    } else {
      this.logger.warn(`Ignoring malformed store file ${this.filePath}`);
    }
    return values;
  }

  private async writeAll(values: Record<string, string>): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    await writeFile(tempPath, JSON.stringify(values, null, 2), 'utf-8');
    await rename(tempPath, this.filePath);
  }
}

/**
 * The single remembered umbrella. Saving overwrites, only forget() removes it.
 */
export class BondStore {
  constructor(private readonly store: KeyValueStore) {}

  async load(): Promise<string | null> {
    const id = await this.store.get(BONDED_UMBRELLA_KEY);
    return id ? id : null;
  }

  async save(deviceId: string): Promise<void> {
    await this.store.set(BONDED_UMBRELLA_KEY, deviceId);
  }

  async forget(): Promise<void> {
    await this.store.delete(BONDED_UMBRELLA_KEY);
  }
}
