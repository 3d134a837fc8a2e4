import { afterEach, describe, expect, it, vi } from 'vitest';
import { runWithRetry, sleep } from '../src/export/retry.js';

type Outcome = { ok: boolean; label: string };

function sequence(...results: Array<Outcome | Error>) {
  return vi.fn(async (attempt: number): Promise<Outcome> => {
    const next = results[attempt - 1] ?? results[results.length - 1];
    if (next instanceof Error) {
      throw next;
    }
    if (!next) {
      throw new Error('no scripted result');
    }
    return next;
  });
}

describe('RetryPolicy', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('gives up after the configured number of attempts', async () => {
    const operation = sequence({ ok: false, label: 'exit-1' });
    const onRetry = vi.fn();

    const result = await runWithRetry(operation, { maxRetries: 3, retryDelayMs: 0, onRetry });

    expect(result).toEqual({
      ok: false,
      attempts: 3,
      value: { ok: false, label: 'exit-1' },
      error: null,
      aborted: false
    });
    expect(operation).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls).toEqual([
      [2, 0],
      [3, 0]
    ]);
  });

  it('stops at the first success', async () => {
    const operation = sequence({ ok: false, label: 'first' }, { ok: true, label: 'second' });

    const result = await runWithRetry(operation, { maxRetries: 3, retryDelayMs: 0 });

    expect(result.ok).toBe(true);
    expect(result.attempts).toBe(2);
    expect(result.value?.label).toBe('second');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('succeeds on the last allowed attempt after two failures', async () => {
    const operation = sequence(
      { ok: false, label: 'first' },
      { ok: false, label: 'second' },
      { ok: true, label: 'third' },
      { ok: true, label: 'unused' }
    );

    const result = await runWithRetry(operation, { maxRetries: 3, retryDelayMs: 0 });

    expect(result).toEqual({
      ok: true,
      attempts: 3,
      value: { ok: true, label: 'third' },
      error: null,
      aborted: false
    });
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('makes exactly two attempts when two are allowed and both fail', async () => {
    const operation = sequence({ ok: false, label: 'exit-1' }, { ok: false, label: 'exit-2' }, { ok: true, label: 'late' });

    const result = await runWithRetry(operation, { maxRetries: 2, retryDelayMs: 0 });

    expect(result.ok).toBe(false);
    expect(result.attempts).toBe(2);
    expect(result.value?.label).toBe('exit-2');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('counts a thrown error as a failed attempt', async () => {
    const operation = sequence(new Error('spawn EACCES'), { ok: true, label: 'recovered' });
    const onAttempt = vi.fn();

    const result = await runWithRetry(operation, { maxRetries: 2, retryDelayMs: 0, onAttempt });

    expect(result.ok).toBe(true);
    expect(result.attempts).toBe(2);
    expect(onAttempt.mock.calls[0]?.[1]).toEqual({ ok: false, value: null, error: new Error('spawn EACCES') });
  });

  it('reports the last error when every attempt throws', async () => {
    const result = await runWithRetry(sequence(new Error('boom')), { maxRetries: 2, retryDelayMs: 0 });

    expect(result.ok).toBe(false);
    expect(result.attempts).toBe(2);
    expect(result.error?.message).toBe('boom');
  });

  it('waits the retry delay only between attempts', async () => {
    vi.useFakeTimers();
    const operation = sequence({ ok: false, label: 'first' }, { ok: true, label: 'second' });

    const pending = runWithRetry(operation, { maxRetries: 3, retryDelayMs: 5000 });
    await vi.advanceTimersByTimeAsync(0);
    expect(operation).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(4999);
    expect(operation).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    const result = await pending;
    expect(operation).toHaveBeenCalledTimes(2);
    expect(result.ok).toBe(true);
  });

  it('stops retrying once aborted', async () => {
    const controller = new AbortController();
    const operation = vi.fn(async (): Promise<Outcome> => {
      controller.abort();
      return { ok: false, label: 'failed' };
    });

    const result = await runWithRetry(operation, {
      maxRetries: 5,
      retryDelayMs: 60_000,
      signal: controller.signal
    });

    expect(operation).toHaveBeenCalledTimes(1);
    expect(result).toEqual({
      ok: false,
      attempts: 1,
      value: { ok: false, label: 'failed' },
      error: null,
      aborted: true
    });
  });

  it('resolves a sleep early when its signal aborts', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const settled = vi.fn();

    const pending = sleep(10_000, controller.signal).then(settled);
    controller.abort();
    await pending;

    expect(settled).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });
});
