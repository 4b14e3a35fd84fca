import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import type { Readable, Writable } from 'stream';
import { AUDIO_FORMAT_INFO, type AudioChunk, type AudioFormat } from '@speech-gateway/types';
import { TranscodeError } from './errors';
import type { AdmissionCounter } from './lib/admission';
import { createLogger } from './utils/logger';

const log = createLogger('transcoder');

const STDERR_LIMIT_BYTES = 4096;

export interface Transcoder {
  /**
   * Converts a chunk stream between encodings. Identical formats pass
   * through untouched. Output seq starts at 0.
   */
  transcode(
    input: AsyncIterable<AudioChunk>,
    from: AudioFormat,
    to: AudioFormat,
    signal?: AbortSignal
  ): AsyncIterable<AudioChunk>;
}

// The slice of ChildProcess the transcoder relies on
export interface TranscoderProcess extends EventEmitter {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly pid?: number;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnTranscoder = (command: string, args: string[]) => TranscoderProcess;

const defaultSpawn: SpawnTranscoder = (command, args) => spawn(command, args, { stdio: 'pipe' });

export interface FfmpegTranscoderOptions {
  ffmpegPath: string;
  admission: AdmissionCounter;
  killGraceMs: number;
  spawn?: SpawnTranscoder;
}

interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

export function buildFfmpegArgs(from: AudioFormat, to: AudioFormat): string[] {
  return [
    '-hide_banner',
    '-loglevel', 'error',
    ...AUDIO_FORMAT_INFO[from].inputArgs,
    '-i', 'pipe:0',
    '-vn',
    ...AUDIO_FORMAT_INFO[to].outputArgs,
    'pipe:1',
  ];
}

function waitFor<T>(promise: Promise<T>, ms: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    promise.then(() => { clearTimeout(timer); resolve(true); }, () => { clearTimeout(timer); resolve(true); });
  });
}

/**
 * One ffmpeg subprocess, from spawn to reaped exit. `close()` is the only
 * way out: it terminates the process if still running (SIGTERM, then
 * SIGKILL after the grace period) and frees the admission slot.
 */
class TranscoderScope {
  private readonly exited: Promise<ProcessExit>;
  private stderr = '';
  private upstreamError: { error: unknown } | null = null;
  private closed = false;

  constructor(
    private readonly child: TranscoderProcess,
    private readonly release: () => void,
    private readonly killGraceMs: number
  ) {
    this.exited = new Promise<ProcessExit>((resolve) => {
      child.once('error', (error: Error) => resolve({ code: null, signal: null, error }));
      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => resolve({ code, signal }));
    });
    child.stderr.on('data', (chunk: Buffer) => {
      if (this.stderr.length < STDERR_LIMIT_BYTES) {
        this.stderr = (this.stderr + chunk.toString('utf8')).slice(0, STDERR_LIMIT_BYTES);
      }
    });
    // EPIPE once ffmpeg has exited; the exit status carries the real failure
    child.stdin.on('error', (error: Error) => log.debug('stdin error pid=', child.pid, error.message));
  }

  get running(): boolean {
    return this.child.exitCode === null && this.child.signalCode === null;
  }

  terminate(): void {
    if (this.running) this.child.kill('SIGTERM');
  }

  async *run(input: AsyncIterable<AudioChunk>, signal?: AbortSignal): AsyncGenerator<AudioChunk> {
    const { child } = this;
    const onAbort = () => this.terminate();
    signal?.addEventListener('abort', onAbort, { once: true });

    // Feed stdin concurrently with reading stdout; a failure upstream kills ffmpeg
    const pump = this.pump(input);
    pump.catch((error: unknown) => log.error('stdin pump crashed:', error));

    try {
      let seq = 0;
      let readError: unknown;
      try {
        for await (const data of child.stdout) {
          if (signal?.aborted) break;
          const buf = Buffer.isBuffer(data) ? data : Buffer.from(String(data));
          if (buf.byteLength === 0) continue;
          yield { seq: seq++, data: buf };
        }
      } catch (error) {
        readError = error;
      }

      if (signal?.aborted) throw signal.reason;
      const exit = await this.exited;
      if (this.upstreamError) throw this.upstreamError.error;
      if (exit.error) {
        throw new TranscodeError('Failed to start transcoder', exit.error.message);
      }
      const diagnostic = this.stderr.trim();
      if (exit.code !== 0 || diagnostic) {
        const how = exit.signal ? `was killed by ${exit.signal}` : `exited with code ${exit.code}`;
        throw new TranscodeError(`Transcoder ${how}`, diagnostic, exit.code);
      }
      if (readError) {
        throw new TranscodeError('Transcoder output failed', readError instanceof Error ? readError.message : String(readError));
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async pump(input: AsyncIterable<AudioChunk>): Promise<void> {
    const { stdin } = this.child;
    try {
      for await (const chunk of input) {
        if (this.closed || stdin.destroyed || !stdin.writable) return;
        if (!stdin.write(chunk.data)) {
          await new Promise<void>((resolve) => {
            const done = () => {
              stdin.off('drain', done);
              stdin.off('close', done);
              resolve();
            };
            stdin.once('drain', done);
            stdin.once('close', done);
          });
        }
      }
      if (!stdin.destroyed) stdin.end();
    } catch (error) {
      this.upstreamError = { error };
      this.terminate();
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      if (this.running) {
        const pid = this.child.pid;
        this.child.kill('SIGTERM');
        if (!(await waitFor(this.exited, this.killGraceMs))) {
          log.warn('transcoder ignored SIGTERM; sending SIGKILL pid=', pid);
          this.child.kill('SIGKILL');
          await waitFor(this.exited, this.killGraceMs);
        }
      }
    } finally {
      this.release();
    }
  }
}

export class FfmpegTranscoder implements Transcoder {
  private readonly spawnProcess: SpawnTranscoder;

  constructor(private readonly options: FfmpegTranscoderOptions) {
    this.spawnProcess = options.spawn ?? defaultSpawn;
  }

  async *transcode(
    input: AsyncIterable<AudioChunk>,
    from: AudioFormat,
    to: AudioFormat,
    signal?: AbortSignal
  ): AsyncGenerator<AudioChunk> {
    if (from === to) {
      yield* input;
      return;
    }

    const release = await this.options.admission.acquire(signal);
    let scope: TranscoderScope;
    try {
      const args = buildFfmpegArgs(from, to);
      const child = this.spawnProcess(this.options.ffmpegPath, args);
      log.debug('spawned pid=', child.pid, `${from} -> ${to}`);
      scope = new TranscoderScope(child, release, this.options.killGraceMs);
    } catch (error) {
      release();
      throw new TranscodeError('Failed to start transcoder', error instanceof Error ? error.message : String(error));
    }

    try {
      yield* scope.run(input, signal);
    } finally {
      await scope.close();
    }
  }
}
