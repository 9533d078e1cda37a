/**
 * Error thrown when queue wait times out.
 */
export class CapacityExceededError extends Error {
  readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number) {
    super(message);
    this.name = "CapacityExceededError";
    this.retryAfterMs = retryAfterMs;
  }
}

export type ConcurrencyLimiterOptions = {
  maxConcurrent: number;
  /** Timeout for waiting in queue (ms). 0 = no timeout */
  queueTimeoutMs?: number;
};

type Waiter = {
  resolve: () => void;
  reject: (err: Error) => void;
  timeoutId?: ReturnType<typeof setTimeout>;
};

/**
 * Runs at most `maxConcurrent` tasks at once; the rest wait in FIFO order.
 * Used both for HTTP ingress and for capability fan-out inside one tool step.
 */
export class ConcurrencyLimiter {
  private readonly maxConcurrent: number;
  private readonly queueTimeoutMs: number;
  private currentCount = 0;
  private readonly queue: Waiter[] = [];

  constructor(options: number | ConcurrencyLimiterOptions) {
    if (typeof options === "number") {
      this.maxConcurrent = options;
      this.queueTimeoutMs = 0;
    } else {
      this.maxConcurrent = options.maxConcurrent;
      this.queueTimeoutMs = options.queueTimeoutMs ?? 0;
    }
    if (!Number.isInteger(this.maxConcurrent) || this.maxConcurrent < 1) {
      throw new Error("maxConcurrent must be a positive integer");
    }
  }

  get running(): number {
    return this.currentCount;
  }

  get queued(): number {
    return this.queue.length;
  }

  get atCapacity(): boolean {
    return this.currentCount >= this.maxConcurrent;
  }

  /**
   * Run a task once a slot is free.
   * @throws CapacityExceededError if queue wait times out
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.currentCount >= this.maxConcurrent) {
      await this.waitForSlot();
    }

    this.currentCount++;
    try {
      return await task();
    } finally {
      this.currentCount--;
      const next = this.queue.shift();
      if (next) {
        if (next.timeoutId) {
          clearTimeout(next.timeoutId);
        }
        next.resolve();
      }
    }
  }

  /**
   * Apply `fn` to every item under the limit. Results keep input order,
   * whatever order the tasks finish in.
   */
  map<I, O>(items: readonly I[], fn: (item: I, index: number) => Promise<O>): Promise<O[]> {
    return Promise.all(items.map((item, index) => this.run(() => fn(item, index))));
  }

  private waitForSlot(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const entry: Waiter = { resolve, reject };

      if (this.queueTimeoutMs > 0) {
        entry.timeoutId = setTimeout(() => {
          const idx = this.queue.indexOf(entry);
          if (idx !== -1) {
            this.queue.splice(idx, 1);
          }
          reject(
            new CapacityExceededError(
              `Queue wait exceeded ${this.queueTimeoutMs}ms timeout`,
              this.queueTimeoutMs
            )
          );
        }, this.queueTimeoutMs);
      }

      this.queue.push(entry);
    });
  }
}
