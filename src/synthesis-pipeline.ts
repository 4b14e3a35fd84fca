/**
 * Synthesis Pipeline
 * validate → provider stream → (transcode) → caller, under one deadline.
 * Owns cancellation: caller disconnect and deadline expiry abort the job
 * signal, which the provider connection and the transcoder are bound to.
 */

import {
  SynthesisRequestSchema,
  type AudioChunk,
  type AudioFormat,
  type SynthesisRequest,
  type SynthesisRequestInput,
} from '@speech-gateway/types';
import { CancelledError, InvalidRequestError } from './errors';
import { raceAbort } from './lib/abort';
import type { TTSProvider } from './providers/tts/base';
import { SynthesisJob, isTerminal } from './synthesis-job';
import type { Transcoder } from './transcoder';
import { createLogger, type Logger } from './utils/logger';

export interface SynthesisPipelineOptions {
  provider: TTSProvider;
  transcoder: Transcoder;
  deadlineMs: number;
  logger?: Logger;
}

export interface SynthesisRun {
  job: SynthesisJob;
  chunks: AsyncIterable<AudioChunk>;
}

async function* tapFirst<T>(source: AsyncIterable<T>, onFirst: () => void): AsyncGenerator<T> {
  let first = true;
  for await (const item of source) {
    if (first) {
      first = false;
      onFirst();
    }
    yield item;
  }
}

export class SynthesisPipeline {
  private readonly log: Logger;

  constructor(private readonly options: SynthesisPipelineOptions) {
    this.log = options.logger ?? createLogger('pipeline');
  }

  /** Encoding requested from the provider for a given target. */
  sourceFormatFor(target: AudioFormat): AudioFormat {
    const { provider } = this.options;
    return provider.nativeFormats.includes(target) ? target : provider.defaultFormat;
  }

  /**
   * Accepts a request and returns its job plus the lazy chunk stream.
   * Nothing is dispatched until the stream is iterated. Throws
   * InvalidRequestError synchronously for a malformed request.
   */
  start(input: unknown, signal?: AbortSignal): SynthesisRun {
    const job = new SynthesisJob(this.validate(input), this.options.deadlineMs);
    return { job, chunks: this.run(job, signal) };
  }

  /** Parses a raw request body; throws InvalidRequestError naming the first bad field. */
  validate(input: unknown): SynthesisRequest {
    const parsed = SynthesisRequestSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidRequestError(issue ? `${issue.path.join('.') || 'request'}: ${issue.message}` : 'invalid request');
    }
    return parsed.data;
  }

  handle(input: SynthesisRequestInput, signal?: AbortSignal): AsyncIterable<AudioChunk> {
    return this.start(input, signal).chunks;
  }

  private async *run(job: SynthesisJob, external?: AbortSignal): AsyncGenerator<AudioChunk> {
    const { provider, transcoder } = this.options;
    const log = this.log;
    const onExternalAbort = () => job.cancel();
    if (external?.aborted) job.cancel();
    external?.addEventListener('abort', onExternalAbort, { once: true });

    const { text, voice, format: target } = job.request;
    const source = this.sourceFormatFor(target);
    let seq = 0;
    let bytes = 0;

    try {
      if (job.signal.aborted) throw job.signal.reason;
      log.info(`job ${job.id} start provider=${provider.type} voice=${voice ?? 'default'} ${source}->${target} text.len=${text.length}`);
      job.advance('STREAMING');

      let stream: AsyncIterable<AudioChunk> = provider.synthesize({ text, voice, format: source }, job.signal);
      if (source !== target) {
        const raw = tapFirst(stream, () => job.advance('TRANSCODING'));
        stream = transcoder.transcode(raw, source, target, job.signal);
      }

      const iterator = stream[Symbol.asyncIterator]();
      try {
        while (true) {
          const result = await raceAbort(iterator.next(), job.signal);
          if (result.done) break;
          if (job.signal.aborted) throw job.signal.reason;
          if (isTerminal(job.status)) break;
          bytes += result.value.data.byteLength;
          yield { seq: seq++, data: result.value.data };
        }
      } finally {
        // a next() may still be in flight after an abort; the signal unwinds it
        iterator.return?.()?.catch((e: unknown) => {
          log.debug(`job ${job.id} upstream close failed:`, e instanceof Error ? e.message : String(e));
        });
      }

      if (job.signal.aborted) throw job.signal.reason;
      job.complete();
      log.info(`job ${job.id} done chunks=${seq} bytes=${bytes} in ${job.elapsedMs}ms`);
    } catch (error) {
      const failure = job.fail(job.signal.aborted ? job.signal.reason : error);
      if (failure instanceof CancelledError) {
        log.info(`job ${job.id} cancelled after ${seq} chunk(s)`);
      } else {
        log.warn(`job ${job.id} failed (${failure.code}) after ${seq} chunk(s) in ${job.elapsedMs}ms:`, failure.message);
      }
      throw failure;
    } finally {
      external?.removeEventListener('abort', onExternalAbort);
      if (!isTerminal(job.status)) {
        // consumer stopped iterating early
        job.fail(job.signal.aborted ? job.signal.reason : new CancelledError('Consumer stopped reading'));
        log.info(`job ${job.id} cancelled by consumer after ${seq} chunk(s)`);
      }
    }
  }
}
