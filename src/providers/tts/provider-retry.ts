import type { AudioChunk } from '@speech-gateway/types';
import { GatewayError, ProviderError } from '../../errors';
import { computeBackoffDelay, sleep, type BackoffPolicy } from '../../lib/backoff';
import type { Logger } from '../../utils/logger';

export interface ProviderRetryOptions {
  maxAttempts: number;
  backoff: BackoffPolicy;
  logger: Logger;
  random?: () => number;
}

/**
 * Runs `open` until it completes, retrying the whole call on retryable
 * provider errors while nothing has been yielded yet. Each non-empty frame
 * becomes one chunk; seq is gapless across attempts.
 */
export async function* streamWithRetry(
  open: (attempt: number) => AsyncIterable<Buffer>,
  options: ProviderRetryOptions,
  signal?: AbortSignal
): AsyncGenerator<AudioChunk> {
  const { maxAttempts, backoff, logger, random } = options;
  let seq = 0;

  for (let attempt = 1; ; attempt++) {
    try {
      for await (const frame of open(attempt)) {
        if (signal?.aborted) throw signal.reason;
        if (frame.byteLength === 0) continue;
        yield { seq: seq++, data: frame };
      }
      return;
    } catch (error) {
      if (signal?.aborted) throw signal.reason;
      if (error instanceof GatewayError && !(error instanceof ProviderError)) throw error;

      const failure = error instanceof ProviderError
        ? error
        : new ProviderError('unavailable', error instanceof Error ? error.message : String(error), { cause: error });

      if (!failure.retryable || seq > 0 || attempt >= maxAttempts) {
        if (failure.retryable && seq > 0) {
          logger.warn(`stream failed after ${seq} chunk(s); not retrying:`, failure.message);
        }
        throw failure;
      }

      // server hint wins over the schedule, but never waits past the cap
      const delay = failure.retryAfterMs !== undefined
        ? Math.min(failure.retryAfterMs, backoff.maxMs)
        : computeBackoffDelay(attempt, backoff, random);
      logger.warn(`attempt ${attempt}/${maxAttempts} failed (${failure.kind}); retrying in ${delay}ms:`, failure.message);
      await sleep(delay, signal);
    }
  }
}
