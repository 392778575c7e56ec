/**
 * Keyed Async Mutex
 * Serializes work per key; unrelated keys run concurrently.
 *
 * Re-entrant within one async call chain: a holder that awaits another
 * runExclusive() on the same key runs it directly instead of deadlocking.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

export interface KeyedMutex {
  runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T>;
  isLocked(key: string): boolean;
}

export function createKeyedMutex(): KeyedMutex {
  const tails = new Map<string, Promise<void>>();
  const held = new AsyncLocalStorage<ReadonlySet<string>>();

  return {
    async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
      const current = held.getStore();
      if (current?.has(key) === true) {
        return fn();
      }

      const previous = tails.get(key) ?? Promise.resolve();
      let unlock: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        unlock = resolve;
      });
      const tail = previous.then(() => gate);
      tails.set(key, tail);

      await previous;
      try {
        const keys = new Set(current ?? []);
        keys.add(key);
        return await held.run(keys, fn);
      } finally {
        unlock();
        if (tails.get(key) === tail) {
          tails.delete(key);
        }
      }
    },

    isLocked(key: string): boolean {
      return tails.has(key);
    },
  };
}
