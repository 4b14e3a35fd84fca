import { describe, it, expect } from 'vitest';
import { AdmissionCounter } from '../admission';

describe('AdmissionCounter', () => {
  it('rejects invalid limits', () => {
    expect(() => new AdmissionCounter(0)).toThrow('Invalid admission limit: 0');
    expect(() => new AdmissionCounter(1.5)).toThrow();
  });

  it('grants slots up to the limit and queues the rest', async () => {
    const counter = new AdmissionCounter(2);
    const a = await counter.acquire();
    await counter.acquire();
    expect(counter.inUse).toBe(2);

    let granted = false;
    const third = counter.acquire().then((release) => {
      granted = true;
      return release;
    });
    await Promise.resolve();
    expect(granted).toBe(false);
    expect(counter.queued).toBe(1);

    a();
    const release = await third;
    expect(granted).toBe(true);
    expect(counter.inUse).toBe(2);
    expect(counter.queued).toBe(0);
    release();
    expect(counter.inUse).toBe(1);
  });

  it('ignores a second call to the same release', async () => {
    const counter = new AdmissionCounter(1);
    const release = await counter.acquire();
    release();
    release();
    expect(counter.inUse).toBe(0);
  });

  it('removes a waiter whose signal aborts', async () => {
    const counter = new AdmissionCounter(1);
    const held = await counter.acquire();
    const controller = new AbortController();
    const waiting = counter.acquire(controller.signal);
    const reason = new Error('gone');
    controller.abort(reason);
    await expect(waiting).rejects.toBe(reason);
    expect(counter.queued).toBe(0);
    held();
    expect(counter.inUse).toBe(0);
  });

  it('rejects at once for an aborted signal', async () => {
    const counter = new AdmissionCounter(1);
    await expect(counter.acquire(AbortSignal.abort('nope'))).rejects.toBe('nope');
    expect(counter.inUse).toBe(0);
  });
});
