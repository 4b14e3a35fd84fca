import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ProviderHealth } from '../router/provider-health';
import { StubProvider } from './fakes';

describe('ProviderHealth', () => {
  let now = 0;
  const clock = () => now;

  beforeEach(() => {
    now = 0;
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('serves a cached report within the ttl', async () => {
    const provider = new StubProvider();
    const healthCheck = vi.spyOn(provider, 'healthCheck');
    const health = new ProviderHealth(provider, { ttlMs: 100, now: clock });

    const first = await health.check();
    now = 50;
    const second = await health.check();

    expect(healthCheck).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(first).toEqual({ provider: 'elevenlabs', state: 'ready', checkedAt: 0, consecutiveFailures: 0 });
  });

  it('shares one health check between concurrent callers', async () => {
    const provider = new StubProvider();
    const healthCheck = vi.spyOn(provider, 'healthCheck');
    const health = new ProviderHealth(provider, { ttlMs: 0, now: clock });

    const [a, b] = await Promise.all([health.check(), health.check()]);

    expect(healthCheck).toHaveBeenCalledTimes(1);
    expect(a).toBe(b);
  });

  it('opens the circuit after repeated failures and checks again once it expires', async () => {
    const provider = new StubProvider();
    provider.healthy = false;
    const healthCheck = vi.spyOn(provider, 'healthCheck');
    const health = new ProviderHealth(provider, { ttlMs: 0, failureThreshold: 2, openMs: 1000, now: clock });

    now = 1;
    expect(await health.check()).toMatchObject({ state: 'unavailable', consecutiveFailures: 1 });
    now = 2;
    expect(await health.check()).toMatchObject({ state: 'unavailable', consecutiveFailures: 2 });
    now = 3;
    expect(await health.check()).toMatchObject({ state: 'circuit_open', consecutiveFailures: 2 });
    expect(healthCheck).toHaveBeenCalledTimes(2);

    provider.healthy = true;
    now = 1003;
    expect(await health.check()).toEqual({ provider: 'elevenlabs', state: 'ready', checkedAt: 1003, consecutiveFailures: 0 });
    expect(healthCheck).toHaveBeenCalledTimes(3);
  });

  it('reports a health check that never answers as unavailable', async () => {
    const provider = new StubProvider();
    vi.spyOn(provider, 'healthCheck').mockReturnValue(new Promise<boolean>(() => {}));
    const health = new ProviderHealth(provider, { ttlMs: 0, checkTimeoutMs: 20, now: clock });

    expect(await health.check()).toMatchObject({ state: 'unavailable', detail: 'health check timed out after 20ms' });
  });

  it('keeps the failure message of a rejected health check', async () => {
    const provider = new StubProvider();
    vi.spyOn(provider, 'healthCheck').mockRejectedValue(new Error('connect ECONNREFUSED'));
    const health = new ProviderHealth(provider, { ttlMs: 0, now: clock });

    expect(await health.check()).toMatchObject({ state: 'unavailable', detail: 'connect ECONNREFUSED' });
  });
});
