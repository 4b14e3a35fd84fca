import { describe, it, expect } from 'vitest';
import {
  AUDIO_FORMAT_INFO,
  ClientMessageSchema,
  ErrorSchema,
  SynthesisRequestSchema,
  TTSChunkHeaderSchema,
  decodeBinaryFrame,
  encodeBinaryFrame,
} from './index';

describe('SynthesisRequestSchema', () => {
  it('trims text and applies defaults', () => {
    const parsed = SynthesisRequestSchema.parse({ text: '  Hello there  ' });
    expect(parsed).toEqual({ text: 'Hello there', format: 'mp3', stream: true });
  });

  it('rejects whitespace-only text', () => {
    const result = SynthesisRequestSchema.safeParse({ text: '   ' });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.issues[0]?.message).toBe('text must not be empty');
  });

  it('rejects text over 5000 characters', () => {
    expect(SynthesisRequestSchema.safeParse({ text: 'a'.repeat(5001) }).success).toBe(false);
    expect(SynthesisRequestSchema.safeParse({ text: 'a'.repeat(5000) }).success).toBe(true);
  });

  it('rejects unknown formats', () => {
    expect(SynthesisRequestSchema.safeParse({ text: 'hi', format: 'aac' }).success).toBe(false);
  });
});

describe('AUDIO_FORMAT_INFO', () => {
  it('maps every format to a mime type and extension', () => {
    expect(AUDIO_FORMAT_INFO.mp3.mime).toBe('audio/mpeg');
    expect(AUDIO_FORMAT_INFO.ogg.extension).toBe('ogg');
    expect(AUDIO_FORMAT_INFO.pcm.inputArgs).toEqual(['-f', 's16le', '-ar', '44100', '-ac', '1']);
  });
});

describe('binary frames', () => {
  it('encodes a 4-byte big-endian header length followed by header and payload', () => {
    const header = { type: 'tts.chunk', ts: 1, requestId: 'r1', jobId: 'j1', seq: 0, mime: 'audio/mpeg' };
    const frame = encodeBinaryFrame(header, Buffer.from([1, 2, 3]));
    const headerLen = Buffer.byteLength(JSON.stringify(header));
    expect(frame.readUInt32BE(0)).toBe(headerLen);
    expect(frame.length).toBe(4 + headerLen + 3);

    const decoded = decodeBinaryFrame(frame);
    expect(TTSChunkHeaderSchema.parse(decoded.header)).toEqual(header);
    expect([...decoded.payload]).toEqual([1, 2, 3]);
  });

  it('rejects truncated frames', () => {
    expect(() => decodeBinaryFrame(Buffer.from([0, 0]))).toThrow('frame too short');
    expect(() => decodeBinaryFrame(Buffer.from([0, 0, 0, 9, 123]))).toThrow('invalid header length');
  });
});

describe('socket envelopes', () => {
  it('parses a start message with request defaults', () => {
    const msg = ClientMessageSchema.parse({ type: 'synthesize.start', ts: 1, requestId: 'r1', data: { text: 'hi' } });
    expect(msg.type).toBe('synthesize.start');
    if (msg.type === 'synthesize.start') expect(msg.data.format).toBe('mp3');
  });

  it('rejects unknown message types', () => {
    expect(ClientMessageSchema.safeParse({ type: 'session.start', ts: 1, requestId: 'r1' }).success).toBe(false);
  });

  it('defaults retryable to false on error events', () => {
    const msg = ErrorSchema.parse({ type: 'error', ts: 1, requestId: 'r1', data: { code: 'timeout', message: 'late' } });
    expect(msg.data.retryable).toBe(false);
  });
});
