import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ProviderError, TranscodeError } from '../errors';
import { AdmissionCounter } from '../lib/admission';
import { AsyncQueue } from '../lib/async-queue';
import { FfmpegTranscoder, buildFfmpegArgs, type SpawnTranscoder } from '../transcoder';
import type { AudioChunk } from '@speech-gateway/types';
import { FakeChild, chunksOf, collect, echoChild } from './fakes';

function makeTranscoder(spawn: SpawnTranscoder, limit = 2, killGraceMs = 20) {
  const admission = new AdmissionCounter(limit);
  const transcoder = new FfmpegTranscoder({ ffmpegPath: '/usr/bin/ffmpeg', admission, killGraceMs, spawn });
  return { admission, transcoder };
}

describe('buildFfmpegArgs', () => {
  it('reads raw pcm from stdin and writes mp3 to stdout', () => {
    expect(buildFfmpegArgs('pcm', 'mp3')).toEqual([
      '-hide_banner', '-loglevel', 'error',
      '-f', 's16le', '-ar', '44100', '-ac', '1',
      '-i', 'pipe:0',
      '-vn',
      '-codec:a', 'libmp3lame', '-b:a', '128k', '-f', 'mp3',
      'pipe:1',
    ]);
  });
});

describe('FfmpegTranscoder', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('passes identical formats through without a subprocess', async () => {
    const spawn = vi.fn<SpawnTranscoder>();
    const { transcoder, admission } = makeTranscoder(spawn);

    const { chunks } = await collect(transcoder.transcode(chunksOf('a', 'b'), 'mp3', 'mp3'));

    expect(chunks.map((c) => [c.seq, c.data.toString()])).toEqual([[0, 'a'], [1, 'b']]);
    expect(spawn).not.toHaveBeenCalled();
    expect(admission.inUse).toBe(0);
  });

  it('pipes input through ffmpeg and re-sequences the output from 0', async () => {
    const child = echoChild((data) => Buffer.from(data.toString().toUpperCase()));
    const spawn = vi.fn<SpawnTranscoder>().mockReturnValue(child);
    const { transcoder, admission } = makeTranscoder(spawn);

    const { chunks, error } = await collect(transcoder.transcode(chunksOf('abc', 'def'), 'pcm', 'mp3'));

    expect(error).toBeUndefined();
    expect(spawn).toHaveBeenCalledWith('/usr/bin/ffmpeg', buildFfmpegArgs('pcm', 'mp3'));
    expect(Buffer.concat(chunks.map((c) => c.data)).toString()).toBe('ABCDEF');
    expect(chunks.map((c) => c.seq)).toEqual(chunks.map((_c, i) => i));
    expect(admission.inUse).toBe(0);
  });

  it('fails with the diagnostic on a non-zero exit', async () => {
    const child = new FakeChild();
    child.stdin.resume();
    child.stdin.on('end', () => {
      child.stderr.write('Invalid data found when processing input\n');
      setImmediate(() => child.finish(1));
    });
    const { transcoder, admission } = makeTranscoder(() => child);

    const { error } = await collect(transcoder.transcode(chunksOf('junk'), 'pcm', 'mp3'));

    expect(error).toBeInstanceOf(TranscodeError);
    expect(error).toHaveProperty('message', 'Transcoder exited with code 1: Invalid data found when processing input');
    expect(error).toHaveProperty('exitCode', 1);
    expect(admission.inUse).toBe(0);
  });

  it('treats stderr output as a failure even on exit 0', async () => {
    const child = new FakeChild();
    child.stdin.resume();
    child.stdin.on('end', () => {
      child.stderr.write('Header missing');
      setImmediate(() => child.finish(0));
    });
    const { transcoder } = makeTranscoder(() => child);

    const { error } = await collect(transcoder.transcode(chunksOf('x'), 'mp3', 'wav'));

    expect(error).toHaveProperty('message', 'Transcoder exited with code 0: Header missing');
  });

  it('reports a spawn failure and frees the slot', async () => {
    const { transcoder, admission } = makeTranscoder(() => {
      throw new Error('spawn EACCES');
    });

    const { error } = await collect(transcoder.transcode(chunksOf('x'), 'pcm', 'mp3'));

    expect(error).toBeInstanceOf(TranscodeError);
    expect(error).toHaveProperty('message', 'Failed to start transcoder: spawn EACCES');
    expect(admission.inUse).toBe(0);
  });

  it('reports a missing binary', async () => {
    const child = new FakeChild();
    child.stdin.resume();
    setImmediate(() => {
      child.emit('error', new Error('spawn /usr/bin/ffmpeg ENOENT'));
      child.stdout.end();
      child.stderr.end();
    });
    const { transcoder, admission } = makeTranscoder(() => child);

    const { error } = await collect(transcoder.transcode(chunksOf('x'), 'pcm', 'mp3'));

    expect(error).toHaveProperty('message', 'Failed to start transcoder: spawn /usr/bin/ffmpeg ENOENT');
    expect(admission.inUse).toBe(0);
  });

  it('terminates ffmpeg when the signal aborts', async () => {
    const child = echoChild();
    const { transcoder, admission } = makeTranscoder(() => child);
    const input = new AsyncQueue<AudioChunk>();
    input.push({ seq: 0, data: Buffer.from('first') });
    const controller = new AbortController();
    const reason = new Error('caller left');

    const received: string[] = [];
    let caught: unknown;
    try {
      for await (const chunk of transcoder.transcode(input, 'pcm', 'mp3', controller.signal)) {
        received.push(chunk.data.toString());
        controller.abort(reason);
      }
    } catch (error) {
      caught = error;
    }

    expect(received).toEqual(['first']);
    expect(caught).toBe(reason);
    expect(child.kills).toEqual(['SIGTERM']);
    expect(admission.inUse).toBe(0);
  });

  it('escalates to SIGKILL when SIGTERM is ignored', async () => {
    const child = echoChild();
    child.stubborn = true;
    const { transcoder, admission } = makeTranscoder(() => child, 1, 20);
    const input = new AsyncQueue<AudioChunk>();
    input.push({ seq: 0, data: Buffer.from('first') });

    for await (const chunk of transcoder.transcode(input, 'pcm', 'mp3')) {
      expect(chunk.seq).toBe(0);
      break;
    }

    expect(child.kills).toEqual(['SIGTERM', 'SIGKILL']);
    expect(child.signalCode).toBe('SIGKILL');
    expect(admission.inUse).toBe(0);
  });

  it('propagates an upstream failure unchanged and stops ffmpeg', async () => {
    const child = echoChild();
    const { transcoder, admission } = makeTranscoder(() => child);
    const upstream = new ProviderError('unavailable', 'provider went away');
    async function* failing(): AsyncGenerator<AudioChunk> {
      yield { seq: 0, data: Buffer.from('part') };
      throw upstream;
    }

    const { error } = await collect(transcoder.transcode(failing(), 'pcm', 'mp3'));

    expect(error).toBe(upstream);
    expect(child.kills).toEqual(['SIGTERM']);
    expect(admission.inUse).toBe(0);
  });

  it('gives up waiting for a slot when aborted', async () => {
    const spawn = vi.fn<SpawnTranscoder>();
    const { transcoder, admission } = makeTranscoder(spawn, 1);
    const held = await admission.acquire();
    const controller = new AbortController();
    const reason = new Error('deadline');

    const pending = collect(transcoder.transcode(chunksOf('x'), 'pcm', 'mp3', controller.signal));
    await vi.waitFor(() => expect(admission.queued).toBe(1));
    controller.abort(reason);

    const { error } = await pending;
    expect(error).toBe(reason);
    expect(spawn).not.toHaveBeenCalled();
    held();
    expect(admission.inUse).toBe(0);
  });
});
