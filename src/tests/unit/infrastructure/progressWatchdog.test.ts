import { ProgressWatchdog } from '@/utils/progressWatchdog';

describe('ProgressWatchdog', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should reject when no progress is reported in time', async () => {
    const watchdog = new ProgressWatchdog(1000);
    const result = watchdog.race(new Promise<never>(() => undefined));
    const assertion = expect(result).rejects.toThrow('No progress reported for 1000ms');

    await jest.advanceTimersByTimeAsync(1000);

    await assertion;
    expect(watchdog.hasExpired).toBe(true);
  });

  it('should stay armed while work keeps touching it', async () => {
    const watchdog = new ProgressWatchdog(1000);
    let finish: (value: number) => void = () => undefined;
    const work = new Promise<number>((resolve) => {
      finish = resolve;
    });

    const result = watchdog.race(work);
    await jest.advanceTimersByTimeAsync(800);
    watchdog.touch();
    await jest.advanceTimersByTimeAsync(800);

    expect(watchdog.hasExpired).toBe(false);
    finish(42);
    await expect(result).resolves.toBe(42);
  });

  it('should pass through work failures', async () => {
    const watchdog = new ProgressWatchdog(1000);

    await expect(watchdog.race(Promise.reject(new Error('query failed')))).rejects.toThrow(
      'query failed'
    );
    expect(watchdog.hasExpired).toBe(false);
  });
});
