// ProviderFactory
// Builds the configured TTS provider from the frozen gateway config

import type { ProviderConfig } from '../gateway-config';
import type { TTSProvider } from './tts/base';
import { ElevenLabsTTS } from './tts/elevenlabs';
import { OpenAITTS } from './tts/openai';

export class ProviderFactory {
  static createTTS(cfg: ProviderConfig): TTSProvider {
    const common = {
      apiKey: cfg.apiKey,
      baseUrl: cfg.baseUrl,
      modelId: cfg.modelId,
      voices: cfg.voices,
      defaultVoice: cfg.defaultVoice,
      maxTextLength: cfg.maxTextLength,
      maxAttempts: cfg.maxAttempts,
      backoff: { baseMs: cfg.backoffBaseMs, maxMs: cfg.backoffMaxMs },
    };
    switch (cfg.type) {
      case 'openai':
        return new OpenAITTS(common);
      case 'elevenlabs':
      default:
        return new ElevenLabsTTS({ ...common, transport: cfg.transport });
    }
  }
}
