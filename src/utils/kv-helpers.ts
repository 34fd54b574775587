export interface KVCache {
  get(key: string): Promise<string | null>;
  put(key: string, value: string, options?: { expirationTtl?: number }): Promise<void>;
  delete(key: string): Promise<void>;
  list(options?: { prefix?: string; limit?: number }): Promise<{ keys: { name: string }[] }>;
}

export class KVHelpers {
  constructor(private kv: KVCache) {}

  /**
   * Get and parse JSON from KV storage
   */
  async getJSON<T>(key: string): Promise<T | null> {
    const value = await this.kv.get(key);
    if (!value) return null;

    try {
      return JSON.parse(value) as T;
    } catch (error) {
      console.error(`[kv] Failed to parse JSON for key ${key}:`, error);
      return null;
    }
  }

  /**
   * Set JSON value in KV storage
   */
  async setJSON<T>(key: string, value: T, ttl?: number): Promise<void> {
    const jsonStr = JSON.stringify(value);
    await this.kv.put(key, jsonStr, ttl ? { expirationTtl: ttl } : undefined);
  }

  async get(key: string): Promise<string | null> {
    return this.kv.get(key);
  }

  async put(key: string, value: string): Promise<void> {
    await this.kv.put(key, value);
  }

  async delete(key: string): Promise<void> {
    await this.kv.delete(key);
  }

  /**
   * List keys with a given prefix
   */
  async listKeys(prefix: string, limit?: number): Promise<string[]> {
    const result = await this.kv.list({ prefix, limit });
    return result.keys.map(k => k.name);
  }

  async exists(key: string): Promise<boolean> {
    const value = await this.kv.get(key);
    return value !== null;
  }

  /**
   * Get multiple keys at once
   */
  async getMany<T>(keys: string[]): Promise<(T | null)[]> {
    return Promise.all(keys.map(key => this.getJSON<T>(key)));
  }

  /**
   * Append items to a list document in a single write. With `maxLength`,
   * only the newest entries are kept.
   */
  async appendToList<T>(listKey: string, items: T[], maxLength?: number): Promise<void> {
    if (items.length === 0) return;
    const list = (await this.getJSON<T[]>(listKey)) || [];
    list.push(...items);
    const kept = maxLength !== undefined && list.length > maxLength ? list.slice(-maxLength) : list;
    await this.setJSON(listKey, kept);
  }

  async getList<T>(listKey: string): Promise<T[]> {
    return (await this.getJSON<T[]>(listKey)) || [];
  }
}
