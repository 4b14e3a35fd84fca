// TTS provider interface
// Streams synthesized audio as sequenced chunks

import type { AudioChunk, AudioFormat } from '@speech-gateway/types';

export interface ProviderSynthesisRequest {
  text: string;
  // alias or provider voice id; undefined falls back to the configured default
  voice?: string;
  // encoding the provider should emit; must be one of nativeFormats
  format: AudioFormat;
}

export interface TTSProvider {
  name: string;
  type: 'elevenlabs' | 'openai';
  // encodings the backend can emit directly (no transcoding)
  nativeFormats: readonly AudioFormat[];
  // encoding requested when the target is not native
  defaultFormat: AudioFormat;

  /**
   * Lazy, finite, not restartable. Chunk seq starts at 0 and has no gaps.
   * Transient failures are retried internally, only before the first chunk.
   */
  synthesize(request: ProviderSynthesisRequest, signal?: AbortSignal): AsyncIterable<AudioChunk>;

  healthCheck(): Promise<boolean>;
}

export interface ReferenceAudio {
  data: Buffer;
  filename: string;
  mime: string;
}

export interface ClonedVoice {
  voiceId: string;
  name: string;
}

// Instant cloning from a reference recording. Cloned voices are temporary:
// the caller deletes them once the synthesis that needed them has finished.
export interface VoiceCloner {
  cloneVoice(sample: ReferenceAudio, signal?: AbortSignal): Promise<ClonedVoice>;
  deleteVoice(voiceId: string): Promise<void>;
}

export function canCloneVoices(provider: TTSProvider): provider is TTSProvider & VoiceCloner {
  return 'cloneVoice' in provider && 'deleteVoice' in provider;
}
