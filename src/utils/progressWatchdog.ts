/**
 * Fails long-running work that stops reporting progress
 *
 * touch() re-arms the timer; race() settles with the work, or rejects once
 * timeoutMs pass without a touch().
 */
export class ProgressWatchdog {
  private timer: NodeJS.Timeout | null = null;
  private expire: (error: Error) => void = () => undefined;
  private expiredFlag = false;
  private readonly expired: Promise<never>;

  constructor(private readonly timeoutMs: number) {
    this.expired = new Promise<never>((_resolve, reject) => {
      this.expire = reject;
    });
  }

  get hasExpired(): boolean {
    return this.expiredFlag;
  }

  touch(): void {
    this.clear();
    this.timer = setTimeout(() => {
      this.expiredFlag = true;
      this.expire(new Error(`No progress reported for ${this.timeoutMs}ms`));
    }, this.timeoutMs);
    this.timer.unref();
  }

  stop(): void {
    this.clear();
  }

  race<T>(work: Promise<T>): Promise<T> {
    this.touch();
    return Promise.race([work, this.expired]).finally(() => this.stop());
  }

  private clear(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
