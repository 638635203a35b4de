/**
 * Promise-chained mutual exclusion for async critical sections.
 */
export interface Mutex {
  /** Run `fn` once every previously queued section has settled */
  runExclusive<T>(fn: () => Promise<T>): Promise<T>;
  /** True while a section is running or queued */
  isLocked(): boolean;
}

export function createMutex(): Mutex {
  let tail: Promise<void> = Promise.resolve();
  let holders = 0;

  return {
    async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
      const previous = tail;
      let release: () => void = () => {};
      tail = new Promise<void>((resolve) => {
        release = resolve;
      });
      holders++;

      await previous;
      try {
        return await fn();
      } finally {
        holders--;
        release();
      }
    },
    isLocked: () => holders > 0,
  };
}
