/**
 * Topic Radar — Concurrency Primitives
 *
 * Keyed mutex for per-provider and per-fingerprint critical sections,
 * a counting semaphore for the worker pool, and an abortable sleep.
 */

// ============================================================
// KEYED MUTEX
// ============================================================

/**
 * Serializes async critical sections that share a key.
 * Sections with distinct keys run concurrently.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, section: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await section();
    } finally {
      release();
      // Last holder cleans up so the map stays bounded by live keys
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

// ============================================================
// SEMAPHORE
// ============================================================

export interface Semaphore {
  acquire(): Promise<void>;
  release(): void;
}

export function createSemaphore(maxConcurrency: number): Semaphore {
  if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
    throw new RangeError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
  }

  let current = 0;
  const queue: Array<() => void> = [];

  return {
    acquire: () => {
      return new Promise<void>(resolve => {
        if (current < maxConcurrency) {
          current++;
          resolve();
        } else {
          queue.push(resolve);
        }
      });
    },
    release: () => {
      current--;
      const next = queue.shift();
      if (next) {
        current++;
        next();
      }
    },
  };
}

// ============================================================
// SLEEP
// ============================================================

/**
 * Resolves to true after `ms`, or to false as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);

  return new Promise<boolean>(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
