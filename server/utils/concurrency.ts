type Waiter = () => void;

/** Counting semaphore; waiters are served in arrival order. */
export class Semaphore {
  private readonly waiters: Waiter[] = [];
  private permits: number;

  constructor(capacity: number) {
    this.permits = Math.max(1, Math.floor(capacity));
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      throw new Error('Aborted');
    }

    if (this.permits > 0) {
      this.permits -= 1;
      return this.releaser();
    }

    return await new Promise<() => void>((resolve, reject) => {
      const onAbort = () => {
        const idx = this.waiters.indexOf(grant);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(new Error('Aborted'));
      };

      const grant: Waiter = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve(this.releaser());
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(grant);
    });
  }

  /** Runs `task` while holding a permit. */
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
      const next = this.waiters.shift();
      if (next) {
        // Hand the permit straight to the next waiter.
        next();
      } else {
        this.permits += 1;
      }
    };
  }
}
