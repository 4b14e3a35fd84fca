import { describe, it, expect } from 'vitest';
import { computeBackoffDelay, parseRetryAfter, sleep } from '../backoff';

const policy = { baseMs: 300, maxMs: 5000 };

describe('computeBackoffDelay', () => {
  it('doubles the ceiling per attempt', () => {
    const top = () => 0.999999;
    expect(computeBackoffDelay(1, policy, top)).toBe(299);
    expect(computeBackoffDelay(2, policy, top)).toBe(599);
    expect(computeBackoffDelay(3, policy, top)).toBe(1199);
  });

  it('caps the ceiling at maxMs', () => {
    expect(computeBackoffDelay(10, policy, () => 0.5)).toBe(2500);
  });

  it('returns 0 for the lowest jitter draw', () => {
    expect(computeBackoffDelay(4, policy, () => 0)).toBe(0);
  });

  it('stays within bounds for random draws', () => {
    for (let attempt = 1; attempt <= 8; attempt++) {
      const delay = computeBackoffDelay(attempt, policy);
      expect(delay).toBeGreaterThanOrEqual(0);
      expect(delay).toBeLessThan(Math.min(policy.maxMs, policy.baseMs * 2 ** (attempt - 1)));
    }
  });
});

describe('parseRetryAfter', () => {
  it('reads delta-seconds', () => {
    expect(parseRetryAfter('2')).toBe(2000);
    expect(parseRetryAfter(' 1.5 ')).toBe(1500);
  });

  it('reads an HTTP-date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:03 GMT', now)).toBe(3000);
  });

  it('clamps past dates to zero', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:27:00 GMT', now)).toBe(0);
  });

  it('returns undefined for missing or garbage values', () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('')).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('sleep', () => {
  it('resolves after the delay', async () => {
    await expect(sleep(5)).resolves.toBeUndefined();
  });

  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    const reason = new Error('stop');
    controller.abort(reason);
    await expect(pending).rejects.toBe(reason);
  });

  it('rejects immediately when already aborted', async () => {
    const reason = new Error('early');
    await expect(sleep(10_000, AbortSignal.abort(reason))).rejects.toBe(reason);
  });
});
