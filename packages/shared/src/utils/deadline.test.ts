import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { DeadlineExceededError, withDeadline } from './deadline';

describe('withDeadline', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test('resolves with the task result before the deadline', async () => {
    const result = await withDeadline(async () => 'done', 1000);

    expect(result).toBe('done');
  });

  test('rejects with DeadlineExceededError when the task hangs', async () => {
    const pending = withDeadline(() => new Promise<string>(() => {}), 500);
    const assertion = expect(pending).rejects.toBeInstanceOf(
      DeadlineExceededError,
    );

    await vi.advanceTimersByTimeAsync(500);

    await assertion;
  });

  test('aborts the signal handed to the task on timeout', async () => {
    let received: AbortSignal | undefined;
    const pending = withDeadline((signal) => {
      received = signal;
      return new Promise<void>(() => {});
    }, 100);
    const assertion = expect(pending).rejects.toThrow(
      'Operation timed out after 100ms',
    );

    await vi.advanceTimersByTimeAsync(100);
    await assertion;

    expect(received?.aborted).toBe(true);
  });

  test('propagates task errors unchanged', async () => {
    const error = new Error('boom');

    await expect(
      withDeadline(() => Promise.reject(error), 1000),
    ).rejects.toBe(error);
  });

  test('rejects with the parent reason when the parent aborts', async () => {
    const parent = new AbortController();
    const pending = withDeadline(() => new Promise<void>(() => {}), 1000, parent.signal);
    const assertion = expect(pending).rejects.toBe('cancelled');

    parent.abort('cancelled');

    await assertion;
  });

  test('does not start the task when the parent is already aborted', async () => {
    const parent = new AbortController();
    parent.abort('stop');
    const task = vi.fn(async () => 'never');

    await expect(withDeadline(task, 1000, parent.signal)).rejects.toBe('stop');
    expect(task).not.toHaveBeenCalled();
  });
});

describe('DeadlineExceededError', () => {
  test('exposes the timeout and name', () => {
    const error = new DeadlineExceededError(250);

    expect(error.name).toBe('DeadlineExceededError');
    expect(error.timeoutMs).toBe(250);
    expect(error).toBeInstanceOf(Error);
  });
});
