import { describe, it, expect, vi, afterEach } from 'vitest';
import { sleep, withTimeout } from '../timeout.js';
import { CancelledError, TimeoutError } from '../errors.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the result when work finishes in time', async () => {
    await expect(withTimeout('op', 1_000, async () => 'done')).resolves.toBe('done');
  });

  it('rejects with TimeoutError and aborts the inner signal', async () => {
    vi.useFakeTimers();
    let inner: AbortSignal | undefined;
    const pending = withTimeout('model invocation', 50, (signal) => {
      inner = signal;
      return new Promise<string>(() => {});
    });
    const assertion = expect(pending).rejects.toThrow('model invocation timed out after 50ms');
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    expect(inner?.aborted).toBe(true);
    expect(inner?.reason).toBeInstanceOf(TimeoutError);
  });

  it('rejects with CancelledError when the parent signal aborts', async () => {
    const controller = new AbortController();
    const pending = withTimeout('tool add', 10_000, () => new Promise<string>(() => {}), controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it('fails fast when the parent signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => 'never');
    await expect(withTimeout('op', 100, fn, controller.signal)).rejects.toMatchObject({ kind: 'Cancelled' });
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('sleep', () => {
  it('rejects when aborted mid-wait', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});
