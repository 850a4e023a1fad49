export type KeyedMutex = Readonly<{
  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T>;
  isLocked(key: string): boolean;
  activeKeyCount(): number;
}>;

/**
 * One exclusive critical section per key. Tasks for the same key run strictly one after another in
 * arrival order; tasks for different keys never wait on each other. A key's entry is dropped as soon
 * as its queue drains.
 */
export function createKeyedMutex(): KeyedMutex {
  const tails = new Map<string, Promise<void>>();

  return {
    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();
      let release: () => void = () => undefined;
      const current = new Promise<void>((resolve) => {
        release = resolve;
      });
      const tail = previous.then(() => current);
      tails.set(key, tail);

      await previous;
      try {
        return await task();
      } finally {
        release();
        if (tails.get(key) === tail) tails.delete(key);
      }
    },

    isLocked(key: string): boolean {
      return tails.has(key);
    },

    activeKeyCount(): number {
      return tails.size;
    }
  };
}
