import { randomUUID } from 'crypto';
import type { AudioChunk, AudioFormat } from '@speech-gateway/types';
import {
  addElevenLabsVoice,
  checkElevenLabsHealth,
  deleteElevenLabsVoice,
  streamElevenLabsHttp,
  streamElevenLabsSocket,
  type ElevenLabsStreamOptions,
  type FetchLike,
  type SocketFactory,
} from '../../elevenlabs';
import { InvalidRequestError } from '../../errors';
import type { BackoffPolicy } from '../../lib/backoff';
import { createLogger } from '../../utils/logger';
import type { ClonedVoice, ProviderSynthesisRequest, ReferenceAudio, TTSProvider, VoiceCloner } from './base';
import { streamWithRetry } from './provider-retry';
import { resolveVoice } from './voices';

// output_format values for the encodings ElevenLabs emits directly
const OUTPUT_FORMATS: Partial<Record<AudioFormat, string>> = {
  mp3: 'mp3_44100_128',
  pcm: 'pcm_44100',
};

const VOICE_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export interface ElevenLabsTTSConfig {
  apiKey: string;
  baseUrl?: string;
  modelId: string;
  transport: 'http' | 'websocket';
  voices: Readonly<Record<string, string>>;
  defaultVoice?: string;
  maxTextLength: number;
  maxAttempts: number;
  backoff: BackoffPolicy;
  // test seams
  fetchImpl?: FetchLike;
  socketFactory?: SocketFactory;
  random?: () => number;
}

export class ElevenLabsTTS implements TTSProvider, VoiceCloner {
  name = 'ElevenLabs TTS';
  type = 'elevenlabs' as const;
  nativeFormats: readonly AudioFormat[] = ['mp3', 'pcm'];
  defaultFormat: AudioFormat = 'mp3';
  private log = createLogger('tts][elevenlabs');
  // voices cloned by this process and not yet deleted; accepted past the allowlist
  private readonly clonedVoices = new Set<string>();

  constructor(private readonly cfg: ElevenLabsTTSConfig) {}

  async *synthesize(request: ProviderSynthesisRequest, signal?: AbortSignal): AsyncGenerator<AudioChunk> {
    const text = request.text.trim();
    if (!text) throw new InvalidRequestError('text must not be empty');
    if (text.length > this.cfg.maxTextLength) {
      throw new InvalidRequestError(`text exceeds ${this.cfg.maxTextLength} characters`);
    }
    const outputFormat = OUTPUT_FORMATS[request.format];
    if (!outputFormat) {
      throw new InvalidRequestError(`ElevenLabs cannot emit ${request.format} directly`);
    }
    const voiceId = request.voice !== undefined && this.clonedVoices.has(request.voice)
      ? request.voice
      : resolveVoice(request.voice, {
          voices: this.cfg.voices,
          defaultVoice: this.cfg.defaultVoice,
          isValidVoiceId: (id) => VOICE_ID_PATTERN.test(id),
        });

    const options: ElevenLabsStreamOptions = {
      apiKey: this.cfg.apiKey,
      baseUrl: this.cfg.baseUrl,
      voiceId,
      text,
      modelId: this.cfg.modelId,
      outputFormat,
      signal,
    };
    this.log.info('stream start voice=', voiceId, 'text.len=', text.length, 'format=', outputFormat, 'transport=', this.cfg.transport);

    let delivered = 0;
    const chunks = streamWithRetry(
      () => this.cfg.transport === 'websocket'
        ? streamElevenLabsSocket(options, this.cfg.socketFactory)
        : streamElevenLabsHttp(options, this.cfg.fetchImpl),
      { maxAttempts: this.cfg.maxAttempts, backoff: this.cfg.backoff, logger: this.log, random: this.cfg.random },
      signal
    );
    for await (const chunk of chunks) {
      delivered += chunk.data.byteLength;
      yield chunk;
    }
    this.log.debug('stream complete bytes=', delivered);
  }

  async cloneVoice(sample: ReferenceAudio, signal?: AbortSignal): Promise<ClonedVoice> {
    const name = `ref_clone_${randomUUID().slice(0, 8)}`;
    const voiceId = await addElevenLabsVoice(
      { apiKey: this.cfg.apiKey, baseUrl: this.cfg.baseUrl, name, sample, signal },
      this.cfg.fetchImpl
    );
    this.clonedVoices.add(voiceId);
    this.log.info('cloned voice', voiceId, 'from', sample.filename, `(${sample.data.length} bytes)`);
    return { voiceId, name };
  }

  async deleteVoice(voiceId: string): Promise<void> {
    this.clonedVoices.delete(voiceId);
    await deleteElevenLabsVoice(this.cfg.apiKey, voiceId, this.cfg.baseUrl, this.cfg.fetchImpl);
    this.log.info('deleted cloned voice', voiceId);
  }

  async healthCheck(): Promise<boolean> {
    try {
      return await checkElevenLabsHealth(this.cfg.apiKey, this.cfg.baseUrl, this.cfg.fetchImpl);
    } catch (e: unknown) {
      this.log.warn('health check failed:', e instanceof Error ? e.message : String(e));
      return false;
    }
  }
}
