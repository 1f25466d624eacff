/**
 * Counting permit pool
 * Caps how many async tasks may hold a permit at the same time
 */

/**
 * A held unit of concurrency. Must be released exactly once.
 */
export interface Permit {
  release(): void;
}

export class PermitPool {
  readonly size: number;
  private available: number;
  private readonly waiters: Array<(permit: Permit) => void> = [];

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Permit pool size must be a positive integer, got ${size}`);
    }
    this.size = size;
    this.available = size;
  }

  /** Permits currently held */
  get inUse(): number {
    return this.size - this.available;
  }

  /** Tasks waiting for a permit */
  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Wait for a permit. Waiters are served in arrival order.
   */
  acquire(): Promise<Permit> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve(this.createPermit());
    }
    return new Promise<Permit>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Run a task while holding a permit; the permit is released however the task ends
   */
  async use<T>(task: () => Promise<T>): Promise<T> {
    const permit = await this.acquire();
    try {
      return await task();
    } finally {
      permit.release();
    }
  }

  private createPermit(): Permit {
    let released = false;
    return {
      release: () => {
        if (released) {
          throw new Error('Permit released more than once');
        }
        released = true;
        this.handOff();
      },
    };
  }

  /**
   * Give a freed permit straight to the next waiter, or return it to the pool
   */
  private handOff(): void {
    const next = this.waiters.shift();
    if (next) {
      next(this.createPermit());
    } else {
      this.available++;
    }
  }
}
