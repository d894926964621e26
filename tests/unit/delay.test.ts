import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { abortableDelay } from '@/utils/delay';

describe('abortableDelay', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves true once the wait has elapsed', async () => {
    let settled: boolean | null = null;
    void abortableDelay(1000).then((value) => {
      settled = value;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(settled).toBeNull();

    await vi.advanceTimersByTimeAsync(1);
    expect(settled).toBe(true);
  });

  it('resolves false immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(abortableDelay(60_000, controller.signal)).resolves.toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('resolves false as soon as the signal aborts and clears its timer', async () => {
    const controller = new AbortController();
    const wait = abortableDelay(60_000, controller.signal);

    await vi.advanceTimersByTimeAsync(10);
    controller.abort();

    await expect(wait).resolves.toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });
});
