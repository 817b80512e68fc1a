export interface PageTriggerOptions {
  /**
   * Fires held while nobody is pulling. Fires beyond this are dropped.
   * Defaults to unbounded.
   */
  maxPending?: number;
}

/**
 * Push-side "load more" signal for one search session. UI code calls
 * `fire()`; the search pulls one signal per page. The iterator returned by
 * `[Symbol.asyncIterator]` is single-consumer, and ending it closes the trigger.
 */
export class PageTrigger implements AsyncIterable<void> {
  private pending = 0;
  private closed = false;
  private readonly waiters: Array<(result: IteratorResult<void>) => void> = [];
  private readonly maxPending: number;

  constructor(options: PageTriggerOptions = {}) {
    this.maxPending = options.maxPending ?? Infinity;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get pendingCount(): number {
    return this.pending;
  }

  /** Returns false when the fire was dropped. */
  fire(): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: undefined, done: false });
      return true;
    }
    if (this.pending >= this.maxPending) return false;
    this.pending += 1;
    return true;
  }

  /** Ends the sequence once queued fires have been pulled. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<void> {
    return {
      next: () => this.pull(),
      return: async () => {
        this.pending = 0;
        this.close();
        return { value: undefined, done: true };
      },
    };
  }

  private pull(): Promise<IteratorResult<void>> {
    if (this.pending > 0) {
      this.pending -= 1;
      return Promise.resolve({ value: undefined, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
