import OpenAI from 'openai';
import type { AudioChunk, AudioFormat } from '@speech-gateway/types';
import { InvalidRequestError, ProviderError } from '../../errors';
import type { BackoffPolicy } from '../../lib/backoff';
import { parseRetryAfter } from '../../lib/backoff';
import { readBodyFrames } from '../../lib/body-frames';
import { createLogger } from '../../utils/logger';
import type { ProviderSynthesisRequest, TTSProvider } from './base';
import { streamWithRetry } from './provider-retry';
import { resolveVoice } from './voices';

const OPENAI_VOICES = ['alloy', 'ash', 'ballad', 'coral', 'echo', 'fable', 'onyx', 'nova', 'sage', 'shimmer', 'verse'];

// response_format values for the encodings the speech endpoint emits directly
const RESPONSE_FORMATS = {
  mp3: 'mp3',
  wav: 'wav',
  flac: 'flac',
  ogg: 'opus',
} as const;
type NativeFormat = keyof typeof RESPONSE_FORMATS;

function isNativeFormat(format: AudioFormat): format is NativeFormat {
  return format in RESPONSE_FORMATS;
}

export interface OpenAITTSConfig {
  apiKey: string;
  baseUrl?: string;
  modelId: string;
  voices: Readonly<Record<string, string>>;
  defaultVoice?: string;
  maxTextLength: number;
  maxAttempts: number;
  backoff: BackoffPolicy;
  client?: OpenAI;
  random?: () => number;
}

function readHeader(headers: unknown, name: string): string | undefined {
  if (headers instanceof Headers) return headers.get(name) ?? undefined;
  if (typeof headers === 'object' && headers !== null) {
    const value: unknown = Object.getOwnPropertyDescriptor(headers, name)?.value;
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

export function classifyOpenAIFailure(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  if (error instanceof OpenAI.APIConnectionError) {
    return new ProviderError('unavailable', `OpenAI connection failed: ${error.message}`, { cause: error });
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status ?? 502;
    const message = `OpenAI request failed (${status}): ${error.message.slice(0, 200)}`;
    if (error.code === 'insufficient_quota') return new ProviderError('quota', message, { status, cause: error });
    if (status === 401 || status === 403) return new ProviderError('auth', message, { status, cause: error });
    if (status === 429) {
      const retryAfterMs = parseRetryAfter(readHeader(error.headers, 'retry-after'));
      return new ProviderError('rate_limit', message, { status, retryAfterMs, cause: error });
    }
    if (status === 408 || status >= 500) return new ProviderError('unavailable', message, { status, cause: error });
    return new ProviderError('malformed_input', message, { status, cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError('unavailable', `OpenAI request failed: ${message}`, { cause: error });
}

/**
 * OpenAI speech adapter: audio.speech.create with the body read as a stream.
 * The SDK's own retries are off so the gateway's policy applies.
 */
export class OpenAITTS implements TTSProvider {
  name = 'OpenAI TTS';
  type = 'openai' as const;
  nativeFormats: readonly AudioFormat[] = ['mp3', 'wav', 'flac', 'ogg'];
  defaultFormat: AudioFormat = 'mp3';
  private client: OpenAI;
  private log = createLogger('tts][openai');

  constructor(private readonly cfg: OpenAITTSConfig) {
    this.client = cfg.client ?? new OpenAI({ apiKey: cfg.apiKey, baseURL: cfg.baseUrl, maxRetries: 0 });
  }

  async *synthesize(request: ProviderSynthesisRequest, signal?: AbortSignal): AsyncGenerator<AudioChunk> {
    const text = request.text.trim();
    if (!text) throw new InvalidRequestError('text must not be empty');
    if (text.length > this.cfg.maxTextLength) {
      throw new InvalidRequestError(`text exceeds ${this.cfg.maxTextLength} characters`);
    }
    const format = request.format;
    if (!isNativeFormat(format)) {
      throw new InvalidRequestError(`OpenAI cannot emit ${format} directly`);
    }
    const voice = resolveVoice(request.voice, {
      voices: this.cfg.voices,
      defaultVoice: this.cfg.defaultVoice,
      isValidVoiceId: (id) => OPENAI_VOICES.includes(id),
    });
    this.log.info('stream start model=', this.cfg.modelId, 'voice=', voice, 'text.len=', text.length, 'format=', format);

    yield* streamWithRetry(
      () => this.open(text, voice, RESPONSE_FORMATS[format], signal),
      { maxAttempts: this.cfg.maxAttempts, backoff: this.cfg.backoff, logger: this.log, random: this.cfg.random },
      signal
    );
  }

  private async *open(
    input: string,
    voice: string,
    responseFormat: (typeof RESPONSE_FORMATS)[NativeFormat],
    signal?: AbortSignal
  ): AsyncGenerator<Buffer> {
    let res: Response;
    try {
      res = await this.client.audio.speech.create(
        { model: this.cfg.modelId, voice, input, response_format: responseFormat },
        { signal }
      );
    } catch (error) {
      if (signal?.aborted) throw signal.reason;
      throw classifyOpenAIFailure(error);
    }
    if (!res.body) {
      throw new ProviderError('unavailable', 'OpenAI returned an empty body', { status: res.status });
    }
    yield* readBodyFrames(res.body, classifyOpenAIFailure, signal);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch (e: unknown) {
      this.log.warn('health check failed:', e instanceof Error ? e.message : String(e));
      return false;
    }
  }
}
