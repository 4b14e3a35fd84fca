// Readiness of the configured TTS provider: cached health checks plus a circuit breaker

import type { TTSProvider } from '../providers/tts/base';
import { createLogger } from '../utils/logger';

const log = createLogger('health');

export type ReadinessState = 'ready' | 'unavailable' | 'circuit_open';

export interface ReadinessReport {
  provider: TTSProvider['type'];
  state: ReadinessState;
  checkedAt: number;
  consecutiveFailures: number;
  detail?: string;
}

export interface ProviderHealthOptions {
  ttlMs: number;
  failureThreshold?: number;
  openMs?: number;
  checkTimeoutMs?: number;
  now?: () => number;
}

interface CheckOutcome {
  ok: boolean;
  detail?: string;
}

/**
 * Concurrent callers share one in-flight health check. After `failureThreshold`
 * consecutive failures no health check is sent for `openMs`; the next one after
 * that decides whether the circuit stays open.
 */
export class ProviderHealth {
  private last?: ReadinessReport;
  private inFlight?: Promise<ReadinessReport>;
  private openUntil = 0;
  private readonly ttlMs: number;
  private readonly failureThreshold: number;
  private readonly openMs: number;
  private readonly checkTimeoutMs: number;
  private readonly now: () => number;

  constructor(private readonly provider: TTSProvider, options: ProviderHealthOptions) {
    this.ttlMs = options.ttlMs;
    this.failureThreshold = options.failureThreshold ?? 3;
    this.openMs = options.openMs ?? 60_000;
    this.checkTimeoutMs = options.checkTimeoutMs ?? 2500;
    this.now = options.now ?? Date.now;
  }

  check(): Promise<ReadinessReport> {
    const now = this.now();
    if (this.last && this.openUntil > now) {
      return Promise.resolve({ ...this.last, state: 'circuit_open' });
    }
    if (this.last && now - this.last.checkedAt <= this.ttlMs) {
      return Promise.resolve(this.last);
    }
    this.inFlight ??= this.refresh(now).finally(() => {
      this.inFlight = undefined;
    });
    return this.inFlight;
  }

  private async refresh(now: number): Promise<ReadinessReport> {
    const { ok, detail } = await this.runCheck();
    const consecutiveFailures = ok ? 0 : (this.last?.consecutiveFailures ?? 0) + 1;
    if (consecutiveFailures >= this.failureThreshold) {
      this.openUntil = now + this.openMs;
      log.warn(`${this.provider.type} failed ${consecutiveFailures} health checks in a row; pausing checks for ${this.openMs}ms`);
    } else if (ok && this.openUntil > 0) {
      this.openUntil = 0;
      log.info(`${this.provider.type} is healthy again`);
    }
    const report: ReadinessReport = {
      provider: this.provider.type,
      state: ok ? 'ready' : 'unavailable',
      checkedAt: now,
      consecutiveFailures,
      ...(detail ? { detail } : {}),
    };
    this.last = report;
    return report;
  }

  private runCheck(): Promise<CheckOutcome> {
    return new Promise<CheckOutcome>((resolve) => {
      const timer = setTimeout(
        () => resolve({ ok: false, detail: `health check timed out after ${this.checkTimeoutMs}ms` }),
        this.checkTimeoutMs
      );
      this.provider.healthCheck().then(
        (healthy) => {
          clearTimeout(timer);
          resolve(healthy ? { ok: true } : { ok: false, detail: 'provider reported unhealthy' });
        },
        (error: unknown) => {
          clearTimeout(timer);
          resolve({ ok: false, detail: error instanceof Error ? error.message : String(error) });
        }
      );
    });
  }
}
