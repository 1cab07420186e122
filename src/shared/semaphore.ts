export interface Semaphore {
  acquire(): Promise<void>;
  release(): void;
}

/** Counting semaphore; waiters are released in FIFO order. */
export function createSemaphore(limit: number): Semaphore {
  let slots = Math.max(1, limit);
  const waiting: Array<() => void> = [];
  return {
    acquire() {
      if (slots > 0) {
        slots--;
        return Promise.resolve();
      }
      return new Promise((resolve) => waiting.push(resolve));
    },
    release() {
      const next = waiting.shift();
      if (next) next();
      else slots++;
    },
  };
}
