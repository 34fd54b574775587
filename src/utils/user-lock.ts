import { AsyncLocalStorage } from 'node:async_hooks';

interface Ownership {
  live: boolean;
}

/**
 * Keyed async mutex. Work queued under the same key runs one at a time, in
 * arrival order; different keys run independently. Re-entrant: a call made
 * from inside the holder's own work runs immediately. Ownership ends when
 * the holder's work settles, so callbacks it scheduled for later queue like
 * any other caller.
 */
export class UserLockRegistry {
  private tails = new Map<string, Promise<void>>();
  private held = new AsyncLocalStorage<ReadonlyMap<string, Ownership>>();

  async withLock<T>(key: string, work: () => Promise<T>): Promise<T> {
    const owned = this.held.getStore();
    if (owned?.get(key)?.live) {
      return work();
    }

    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    const ownership: Ownership = { live: true };
    try {
      const nextOwned = new Map(owned ?? []);
      nextOwned.set(key, ownership);
      return await this.held.run(nextOwned, work);
    } finally {
      ownership.live = false;
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Run `fn` without the caller's locks. Listeners and jobs started from
   * here take the lock like any other caller.
   */
  outside<T>(fn: () => T): T {
    return this.held.exit(fn);
  }
}

export function userLockKey(userId: string): string {
  return `user:${userId}`;
}
