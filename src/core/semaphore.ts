/**
 * Counting semaphore bounding concurrent work.
 */
export class Semaphore {
  private readonly waiters: Array<() => void> = [];
  private current: number;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error('capacity must be a positive integer');
    }
    this.current = capacity;
  }

  /**
   * Wait for a permit.
   *
   * @returns A release function; call it exactly once
   */
  async acquire(signal?: AbortSignal): Promise<() => void> {
    signal?.throwIfAborted();

    if (this.current > 0) {
      this.current -= 1;
      return this.releaser();
    }

    return new Promise<() => void>((resolve, reject) => {
      const onAbort = (): void => {
        const idx = this.waiters.indexOf(next);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(signal?.reason);
      };
      const next = (): void => {
        signal?.removeEventListener('abort', onAbort);
        this.current -= 1;
        resolve(this.releaser());
      };
      this.waiters.push(next);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Run a task while holding a permit.
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    this.current += 1;
    if (this.current <= 0) return;
    const next = this.waiters.shift();
    if (next) next();
  }
}
