import { Debouncer } from '@/utils/debouncer';

describe('Debouncer', () => {
  let onError: jest.Mock;
  let debouncer: Debouncer<string>;

  beforeEach(() => {
    jest.useFakeTimers();
    onError = jest.fn();
    debouncer = new Debouncer<string>(2000, onError);
  });

  afterEach(() => {
    debouncer.cancelAll();
    jest.useRealTimers();
  });

  it('should run only the last call scheduled for a key', async () => {
    const first = jest.fn().mockResolvedValue(undefined);
    const second = jest.fn().mockResolvedValue(undefined);

    debouncer.schedule('post-1', first);
    await jest.advanceTimersByTimeAsync(1500);
    debouncer.schedule('post-1', second);
    await jest.advanceTimersByTimeAsync(1500);

    expect(first).not.toHaveBeenCalled();
    expect(second).not.toHaveBeenCalled();

    await jest.advanceTimersByTimeAsync(500);

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
    expect(debouncer.pending('post-1')).toBe(false);
  });

  it('should keep keys independent', async () => {
    const a = jest.fn().mockResolvedValue(undefined);
    const b = jest.fn().mockResolvedValue(undefined);

    debouncer.schedule('post-1', a);
    debouncer.schedule('post-2', b);
    await jest.advanceTimersByTimeAsync(2000);

    expect(a).toHaveBeenCalledTimes(1);
    expect(b).toHaveBeenCalledTimes(1);
  });

  it('should run a pending call immediately on flush', async () => {
    const fn = jest.fn().mockResolvedValue(undefined);
    debouncer.schedule('post-1', fn);

    await expect(debouncer.flush('post-1')).resolves.toBe(true);
    expect(fn).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(2000);
    expect(fn).toHaveBeenCalledTimes(1);
    await expect(debouncer.flush('post-1')).resolves.toBe(false);
  });

  it('should drop a cancelled call', async () => {
    const fn = jest.fn().mockResolvedValue(undefined);
    debouncer.schedule('post-1', fn);

    expect(debouncer.cancel('post-1')).toBe(true);
    expect(debouncer.cancel('post-1')).toBe(false);
    await jest.advanceTimersByTimeAsync(2000);

    expect(fn).not.toHaveBeenCalled();
  });

  it('should report errors of timer-fired calls to onError', async () => {
    const failure = new Error('save failed');
    debouncer.schedule('post-1', jest.fn().mockRejectedValue(failure));

    await jest.advanceTimersByTimeAsync(2000);

    expect(onError).toHaveBeenCalledWith('post-1', failure);
  });

  it('should throw errors of flushed calls to the caller', async () => {
    debouncer.schedule('post-1', jest.fn().mockRejectedValue(new Error('save failed')));

    await expect(debouncer.flush('post-1')).rejects.toThrow('save failed');
    expect(onError).not.toHaveBeenCalled();
  });
});
