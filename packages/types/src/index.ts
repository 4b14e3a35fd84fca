import { z } from 'zod';

export const MAX_TEXT_LENGTH = 5000;

// ===== AUDIO FORMATS =====

export const AUDIO_FORMATS = ['mp3', 'wav', 'ogg', 'flac', 'pcm'] as const;
export const AudioFormatSchema = z.enum(AUDIO_FORMATS);
export type AudioFormat = z.infer<typeof AudioFormatSchema>;

export const AUDIO_MIME_TYPES = ['audio/mpeg', 'audio/wav', 'audio/ogg', 'audio/flac', 'audio/pcm'] as const;
export type AudioMime = (typeof AUDIO_MIME_TYPES)[number];

export interface AudioFormatInfo {
  mime: AudioMime;
  extension: string;
  // ffmpeg demuxer args when reading this format from stdin
  inputArgs: readonly string[];
  // ffmpeg muxer/codec args when writing this format to stdout
  outputArgs: readonly string[];
}

// pcm is raw signed 16-bit little-endian mono at 44.1 kHz
export const PCM_SAMPLE_RATE = 44100;

export const AUDIO_FORMAT_INFO: Record<AudioFormat, AudioFormatInfo> = {
  mp3: {
    mime: 'audio/mpeg',
    extension: 'mp3',
    inputArgs: ['-f', 'mp3'],
    outputArgs: ['-codec:a', 'libmp3lame', '-b:a', '128k', '-f', 'mp3'],
  },
  wav: {
    mime: 'audio/wav',
    extension: 'wav',
    inputArgs: ['-f', 'wav'],
    outputArgs: ['-codec:a', 'pcm_s16le', '-f', 'wav'],
  },
  ogg: {
    mime: 'audio/ogg',
    extension: 'ogg',
    inputArgs: ['-f', 'ogg'],
    outputArgs: ['-codec:a', 'libopus', '-b:a', '64k', '-f', 'ogg'],
  },
  flac: {
    mime: 'audio/flac',
    extension: 'flac',
    inputArgs: ['-f', 'flac'],
    outputArgs: ['-codec:a', 'flac', '-f', 'flac'],
  },
  pcm: {
    mime: 'audio/pcm',
    extension: 'pcm',
    inputArgs: ['-f', 's16le', '-ar', String(PCM_SAMPLE_RATE), '-ac', '1'],
    outputArgs: ['-f', 's16le', '-ar', String(PCM_SAMPLE_RATE), '-ac', '1'],
  },
};

// ===== SYNTHESIS REQUEST =====

export const SynthesisRequestSchema = z.object({
  text: z.string().trim().min(1, 'text must not be empty').max(MAX_TEXT_LENGTH),
  // alias or provider voice id; falls back to the configured default voice
  voice: z.string().trim().min(1, 'voice must not be empty').max(128).optional(),
  format: AudioFormatSchema.default('mp3'),
  stream: z.boolean().default(true),
});
export type SynthesisRequest = z.infer<typeof SynthesisRequestSchema>;
export type SynthesisRequestInput = z.input<typeof SynthesisRequestSchema>;

// ===== JOBS & CHUNKS =====

const JOB_STATUSES = ['PENDING', 'STREAMING', 'TRANSCODING', 'DONE', 'FAILED'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export interface AudioChunk {
  seq: number;
  data: Buffer;
}

// ===== ERRORS =====

export const ERROR_CODES = [
  'invalid_request',
  'unauthorized',
  'payload_too_large',
  'provider_auth',
  'provider_quota',
  'provider_rate_limited',
  'provider_rejected_input',
  'upstream_unavailable',
  'transcode_failed',
  'timeout',
  'cancelled',
  'internal_error',
] as const;
export const ErrorCodeSchema = z.enum(ERROR_CODES);
export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

export const ErrorBodySchema = z.object({
  error: z.object({
    code: ErrorCodeSchema,
    message: z.string(),
    retryable: z.boolean(),
    jobId: z.string().optional(),
  }),
});
export type ErrorBody = z.infer<typeof ErrorBodySchema>;

// ===== SOCKET ENVELOPES =====

export const EnvelopeSchema = z.object({
  type: z.string(),
  ts: z.number().int(),
  requestId: z.string().min(1),
  data: z.unknown().optional(),
});

// Client -> Server
export const SynthesizeStartSchema = EnvelopeSchema.extend({
  type: z.literal('synthesize.start'),
  data: SynthesisRequestSchema,
});
export type SynthesizeStart = z.infer<typeof SynthesizeStartSchema>;

export const SynthesizeCancelSchema = EnvelopeSchema.extend({
  type: z.literal('synthesize.cancel'),
});
export type SynthesizeCancel = z.infer<typeof SynthesizeCancelSchema>;

export const ClientMessageSchema = z.discriminatedUnion('type', [
  SynthesizeStartSchema,
  SynthesizeCancelSchema,
]);
export type ClientMessage = z.infer<typeof ClientMessageSchema>;

// Server -> Client
export const TTSEndSchema = EnvelopeSchema.extend({
  type: z.literal('tts.end'),
  data: z.object({
    jobId: z.string(),
    reason: z.enum(['complete', 'cancelled']),
    chunks: z.number().int().nonnegative(),
    bytes: z.number().int().nonnegative(),
  }),
});
export type TTSEnd = z.infer<typeof TTSEndSchema>;

export const ErrorSchema = EnvelopeSchema.extend({
  type: z.literal('error'),
  data: z.object({
    code: ErrorCodeSchema,
    message: z.string(),
    retryable: z.boolean().default(false),
    jobId: z.string().optional(),
  }),
});
export type ErrorEvent = z.infer<typeof ErrorSchema>;

// Binary frame header (first 4 bytes = header length big-endian, then JSON header, then raw bytes)
export const TTSChunkHeaderSchema = z.object({
  type: z.literal('tts.chunk'),
  ts: z.number().int(),
  requestId: z.string().min(1),
  jobId: z.string().min(1),
  seq: z.number().int().nonnegative(),
  mime: z.enum(AUDIO_MIME_TYPES),
});
export type TTSChunkHeader = z.infer<typeof TTSChunkHeaderSchema>;

export function encodeBinaryFrame(header: object, payload: Buffer | Uint8Array): Buffer {
  const headerJson = Buffer.from(JSON.stringify(header), 'utf8');
  const lenBuf = Buffer.alloc(4);
  lenBuf.writeUInt32BE(headerJson.length, 0);
  const payloadBuf = Buffer.isBuffer(payload) ? payload : Buffer.from(payload);
  return Buffer.concat([lenBuf, headerJson, payloadBuf]);
}

export function decodeBinaryFrame(frame: Buffer): { header: unknown; payload: Buffer } {
  if (frame.length < 4) throw new Error('frame too short');
  const headerLen = frame.readUInt32BE(0);
  if (frame.length < 4 + headerLen) throw new Error('invalid header length');
  const headerJson = frame.subarray(4, 4 + headerLen).toString('utf8');
  const header: unknown = JSON.parse(headerJson);
  const payload = frame.subarray(4 + headerLen);
  return { header, payload };
}

export function nowTs(): number {
  return Date.now();
}
