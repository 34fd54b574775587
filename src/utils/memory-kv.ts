import { KVCache } from './kv-helpers';

/**
 * In-process KVCache. Keys list in lexicographic order, like a hosted KV
 * namespace; TTLs are honoured lazily on read.
 */
export class MemoryKvCache implements KVCache {
  private store = new Map<string, { value: string; expiresAt?: number }>();

  constructor(private now: () => number = () => Date.now()) {}

  async get(key: string): Promise<string | null> {
    const entry = this.store.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== undefined && entry.expiresAt <= this.now()) {
      this.store.delete(key);
      return null;
    }
    return entry.value;
  }

  async put(key: string, value: string, options?: { expirationTtl?: number }): Promise<void> {
    const expiresAt = options?.expirationTtl
      ? this.now() + options.expirationTtl * 1000
      : undefined;
    this.store.set(key, { value, expiresAt });
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  async list(options?: { prefix?: string; limit?: number }): Promise<{ keys: { name: string }[] }> {
    const prefix = options?.prefix ?? '';
    const names = [...this.store.keys()].filter(name => name.startsWith(prefix)).sort();
    const limited = options?.limit ? names.slice(0, options.limit) : names;
    return { keys: limited.map(name => ({ name })) };
  }

  get size(): number {
    return this.store.size;
  }
}
