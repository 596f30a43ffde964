import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { backoffFloor, computeBackoff, exponentialBackoff, sleep } from '../backoff.js';

describe('exponentialBackoff', () => {
  it('returns base * 2^attempt', () => {
    expect(exponentialBackoff(100, 0)).toBe(100);
    expect(exponentialBackoff(100, 1)).toBe(200);
    expect(exponentialBackoff(100, 4)).toBe(1_600);
  });
});

describe('computeBackoff', () => {
  it('returns the half floor when jitter is zero', () => {
    const random = () => 0;

    expect(computeBackoff(1_000, 0, random)).toBe(500);   // 1000 / 2
    expect(computeBackoff(1_000, 1, random)).toBe(1_000); // 2000 / 2
    expect(computeBackoff(1_000, 3, random)).toBe(4_000); // 8000 / 2
  });

  it('adds up to another half of the backoff as jitter', () => {
    expect(computeBackoff(1_000, 0, () => 0.5)).toBe(750);
    expect(computeBackoff(1_000, 2, () => 0.999)).toBe(2_000 + 1_998);
  });

  it('stays within [backoff/2, backoff] across many samples', () => {
    const attempt = 3;
    const backoff = 10 * 2 ** attempt; // 80

    for (let i = 0; i < 200; i++) {
      const delay = computeBackoff(10, attempt);
      expect(delay).toBeGreaterThanOrEqual(backoff / 2);
      expect(delay).toBeLessThanOrEqual(backoff);
    }
  });

  it('uses Math.random by default', () => {
    const spy = vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(computeBackoff(200, 1)).toBe(200);
    expect(spy).toHaveBeenCalledOnce();
    spy.mockRestore();
  });

  it('returns 0 for a zero base delay', () => {
    expect(computeBackoff(0, 5, () => 0.7)).toBe(0);
  });
});

describe('backoffFloor', () => {
  it('is non-decreasing across attempts', () => {
    let previous = -1;
    for (let attempt = 0; attempt < 12; attempt++) {
      const floor = backoffFloor(5, attempt);
      expect(floor).toBeGreaterThanOrEqual(previous);
      previous = floor;
    }
  });
});

describe('sleep', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the specified delay', async () => {
    let resolved = false;
    const promise = sleep(1_000).then(() => {
      resolved = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(resolved).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await promise;
    expect(resolved).toBe(true);
  });

  it('rejects immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));

    await expect(sleep(1_000, controller.signal)).rejects.toThrow('cancelled');
  });

  it('rejects when aborted mid-sleep', async () => {
    const controller = new AbortController();
    const promise = sleep(10_000, controller.signal);

    await vi.advanceTimersByTimeAsync(100);
    controller.abort(new Error('shutdown'));

    await expect(promise).rejects.toThrow('shutdown');
  });
});
