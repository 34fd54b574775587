import { nanoid } from 'nanoid';
import { KVCache, KVHelpers } from '../utils/kv-helpers';
import { Clock, systemClock } from '../utils/time';
import { ConcurrencyConflictError } from '../utils/errors';

export interface Versioned {
  version: number;
}

export abstract class BaseRepository {
  protected kv: KVHelpers;

  constructor(kvCache: KVCache, protected clock: Clock = systemClock) {
    this.kv = new KVHelpers(kvCache);
  }

  protected generateId(prefix: string): string {
    return `${prefix}_${nanoid()}`;
  }

  protected now(): string {
    return this.clock.now().toISOString();
  }

  /**
   * Write a record only if the stored copy still carries the version the
   * caller read; the written copy gets the next version.
   */
  protected async saveVersioned<T extends Versioned>(key: string, record: T): Promise<T> {
    const stored = await this.kv.getJSON<T>(key);
    const storedVersion = stored ? stored.version : 0;
    if (storedVersion !== record.version) {
      throw new ConcurrencyConflictError(key);
    }

    const next = { ...record, version: record.version + 1 };
    await this.kv.setJSON(key, next);
    return next;
  }
}
