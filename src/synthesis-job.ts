import { randomUUID } from 'crypto';
import type { JobStatus, SynthesisRequest } from '@speech-gateway/types';
import { CancelledError, GatewayError, TimeoutError, toGatewayError } from './errors';

const STATUS_RANK: Record<JobStatus, number> = {
  PENDING: 0,
  STREAMING: 1,
  TRANSCODING: 2,
  DONE: 3,
  FAILED: 3,
};

export function isTerminal(status: JobStatus): boolean {
  return status === 'DONE' || status === 'FAILED';
}

export type JobListener = (status: JobStatus, job: SynthesisJob) => void;

/**
 * Runtime state of one request. Status only moves forward; DONE and FAILED
 * are final. Aborting `signal` (cancel, deadline) tears down every
 * downstream operation bound to it.
 */
export class SynthesisJob {
  readonly id: string;
  readonly request: Readonly<SynthesisRequest>;
  readonly startedAt: number;
  private _status: JobStatus = 'PENDING';
  private _error?: GatewayError;
  private readonly controller = new AbortController();
  private deadlineTimer?: NodeJS.Timeout;
  private listeners: JobListener[] = [];

  constructor(request: SynthesisRequest, readonly deadlineMs: number, id: string = randomUUID()) {
    this.id = id;
    this.request = Object.freeze({ ...request });
    this.startedAt = Date.now();
    this.deadlineTimer = setTimeout(() => this.abort(new TimeoutError(deadlineMs)), deadlineMs);
    this.deadlineTimer.unref?.();
  }

  get status(): JobStatus {
    return this._status;
  }

  get error(): GatewayError | undefined {
    return this._error;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get elapsedMs(): number {
    return Date.now() - this.startedAt;
  }

  onStatus(listener: JobListener): void {
    this.listeners.push(listener);
  }

  /** Moves to a later non-terminal state; no-op if not strictly forward. */
  advance(next: 'STREAMING' | 'TRANSCODING'): boolean {
    if (isTerminal(this._status) || STATUS_RANK[next] <= STATUS_RANK[this._status]) return false;
    this.setStatus(next);
    return true;
  }

  complete(): boolean {
    if (isTerminal(this._status)) return false;
    this.clearDeadline();
    this.setStatus('DONE');
    return true;
  }

  fail(error: unknown): GatewayError {
    if (isTerminal(this._status)) return this._error ?? toGatewayError(error);
    this._error = toGatewayError(error);
    this.clearDeadline();
    this.setStatus('FAILED');
    // release whatever is still bound to the signal
    if (!this.controller.signal.aborted) this.controller.abort(this._error);
    return this._error;
  }

  /** Caller went away. */
  cancel(reason: string = 'Request cancelled by caller'): void {
    this.abort(new CancelledError(reason));
  }

  // Aborts downstream work; the pipeline observes it and fails the job with the same reason
  private abort(reason: GatewayError): void {
    if (isTerminal(this._status) || this.controller.signal.aborted) return;
    this.controller.abort(reason);
  }

  private clearDeadline(): void {
    if (this.deadlineTimer) {
      clearTimeout(this.deadlineTimer);
      this.deadlineTimer = undefined;
    }
  }

  private setStatus(status: JobStatus): void {
    this._status = status;
    for (const listener of this.listeners) listener(status, this);
  }
}
