/**
 * Outcome of waiting on a {@link OneShot} with a deadline.
 * @public
 */
export type OneShotWaitResult<T> =
  | { settled: true; value: T }
  | { settled: false };

/**
 * Settle-once cell usable as a future by any number of waiters.
 *
 * The first call to {@link OneShot.settle} wins; later calls are no-ops that
 * report `false`. Waiters either await {@link OneShot.promise} or race it
 * against a deadline with {@link OneShot.wait}.
 *
 * @example
 * ```typescript
 * const address = new OneShot<DebuggeeAddress>();
 * address.settle({ host: '127.0.0.1', port: 5005 }); // true
 * address.settle({ host: '127.0.0.1', port: 6006 }); // false, ignored
 * await address.promise; // { host: '127.0.0.1', port: 5005 }
 * ```
 * @public
 */
export class OneShot<T> {
  public readonly promise: Promise<T>;
  private resolvePromise: (value: T) => void = () => {};
  private state: OneShotWaitResult<T> = { settled: false };

  public constructor() {
    this.promise = new Promise<T>((resolve) => {
      this.resolvePromise = resolve;
    });
  }

  public get isSettled(): boolean {
    return this.state.settled;
  }

  /**
   * Reads the cell without waiting
   */
  public peek(): OneShotWaitResult<T> {
    return this.state;
  }

  /**
   * Settles the cell if nothing settled it before.
   * @returns `true` when this call settled the cell
   */
  public settle(value: T): boolean {
    if (this.state.settled) {
      return false;
    }
    this.state = { settled: true, value };
    this.resolvePromise(value);
    return true;
  }

  /**
   * Waits for settlement or for `timeoutMs` to elapse, whichever comes first.
   *
   * The timer is cleared as soon as the cell settles.
   */
  public wait(timeoutMs: number): Promise<OneShotWaitResult<T>> {
    if (this.state.settled) {
      return Promise.resolve(this.state);
    }
    return new Promise<OneShotWaitResult<T>>((resolve) => {
      const timer = setTimeout(() => resolve({ settled: false }), timeoutMs);
      void this.promise.then((value) => {
        clearTimeout(timer);
        resolve({ settled: true, value });
      });
    });
  }
}
