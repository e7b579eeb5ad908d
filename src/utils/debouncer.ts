interface PendingCall {
  timer: NodeJS.Timeout;
  fn: () => Promise<void>;
}

/**
 * Per-key trailing debounce
 *
 * schedule() replaces any pending call for the key and restarts its timer;
 * only the last scheduled function runs. Errors from timer-fired calls go to
 * onError, errors from flush() are thrown to the caller.
 */
export class Debouncer<K> {
  private calls = new Map<K, PendingCall>();

  constructor(
    private readonly waitMs: number,
    private readonly onError: (key: K, error: unknown) => void
  ) {}

  schedule(key: K, fn: () => Promise<void>): void {
    this.clearTimer(key);

    const timer = setTimeout(() => {
      this.flush(key).catch((error: unknown) => this.onError(key, error));
    }, this.waitMs);
    timer.unref();

    this.calls.set(key, { timer, fn });
  }

  /**
   * Run the pending call for a key now. Resolves false when nothing was pending.
   */
  async flush(key: K): Promise<boolean> {
    const call = this.calls.get(key);
    if (!call) return false;

    clearTimeout(call.timer);
    this.calls.delete(key);
    await call.fn();
    return true;
  }

  cancel(key: K): boolean {
    return this.clearTimer(key);
  }

  pending(key: K): boolean {
    return this.calls.has(key);
  }

  cancelAll(): void {
    for (const call of this.calls.values()) {
      clearTimeout(call.timer);
    }
    this.calls.clear();
  }

  private clearTimer(key: K): boolean {
    const call = this.calls.get(key);
    if (!call) return false;
    clearTimeout(call.timer);
    this.calls.delete(key);
    return true;
  }
}
