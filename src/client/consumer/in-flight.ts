/**
 * Counts records that entered `eachMessage` and have not finished their
 * cycle yet, so shutdown can wait for them.
 */
export class InFlightTracker {
  private count = 0;
  private idleWaiters: Array<() => void> = [];

  public get size(): number {
    return this.count;
  }

  /** Run `fn`, counting it as in flight until it settles. */
  public async track<R>(fn: () => Promise<R>): Promise<R> {
    this.count++;
    try {
      return await fn();
    } finally {
      this.count--;
      if (this.count === 0) this.idleWaiters.splice(0).forEach((w) => w());
    }
  }

  /** Resolves `true` once nothing is in flight, `false` if `timeoutMs` passes first. */
  public drained(timeoutMs: number): Promise<boolean> {
    if (this.count === 0) return Promise.resolve(true);
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        this.idleWaiters = this.idleWaiters.filter((w) => w !== onIdle);
        resolve(false);
      }, timeoutMs);
      const onIdle = () => {
        clearTimeout(timer);
        resolve(true);
      };
      this.idleWaiters.push(onIdle);
    });
  }
}
