export type DeadlineReason = "timeout" | "cancelled";

/** Largest delay setTimeout honours; longer ones fire immediately. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * A run-wide deadline. Its signal aborts when the timer fires or when the
 * parent signal aborts, whichever comes first.
 */
export class Deadline {
  readonly signal: AbortSignal;
  private readonly controller = new AbortController();
  private readonly timeoutId: ReturnType<typeof setTimeout>;
  private readonly parent: AbortSignal | undefined;
  private readonly onParentAbort = (): void => this.expire("cancelled");
  private readonly expiredPromise: Promise<void>;
  private reasonValue: DeadlineReason | undefined;

  constructor(timeoutMs: number, parent?: AbortSignal) {
    if (!Number.isInteger(timeoutMs) || timeoutMs < 1 || timeoutMs > MAX_TIMEOUT_MS) {
      throw new RangeError(`Deadline must be 1..${MAX_TIMEOUT_MS}ms, got ${timeoutMs}`);
    }
    this.signal = this.controller.signal;
    this.parent = parent;
    this.expiredPromise = new Promise<void>((resolve) => {
      this.signal.addEventListener("abort", () => resolve(), { once: true });
    });
    this.timeoutId = setTimeout(() => this.expire("timeout"), timeoutMs);

    if (parent?.aborted) {
      this.expire("cancelled");
    } else {
      parent?.addEventListener("abort", this.onParentAbort, { once: true });
    }
  }

  get expired(): boolean {
    return this.signal.aborted;
  }

  get reason(): DeadlineReason | undefined {
    return this.reasonValue;
  }

  /**
   * Settle with the work's value, or with `{ expired: true }` once the
   * deadline passes. The abandoned work keeps its own abort signal.
   */
  async race<T>(work: Promise<T>): Promise<{ expired: false; value: T } | { expired: true }> {
    if (this.expired) return { expired: true };
    return Promise.race([
      work.then((value) => ({ expired: false as const, value })),
      this.expiredPromise.then(() => ({ expired: true as const }))
    ]);
  }

  /** Stop the timer and detach from the parent. Safe to call twice. */
  dispose(): void {
    clearTimeout(this.timeoutId);
    this.parent?.removeEventListener("abort", this.onParentAbort);
  }

  private expire(reason: DeadlineReason): void {
    if (this.signal.aborted) return;
    this.reasonValue = reason;
    clearTimeout(this.timeoutId);
    this.controller.abort(new Error(reason === "timeout" ? "Run deadline exceeded" : "Run cancelled"));
  }
}
