import { MAX_TEXT_LENGTH } from '@speech-gateway/types';
import { createLogger, isLogLevel, redact, type LogLevel } from './utils/logger';

const log = createLogger('config');

// ===== GATEWAY CONFIGURATION =====

export type ProviderType = 'elevenlabs' | 'openai';
export type ElevenLabsTransport = 'http' | 'websocket';

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  accessKey?: string;
  maxBodyBytes: number;
  // upper bound for a reference recording sent for voice cloning
  maxRefBytes: number;
  shutdownGraceMs: number;
}

export interface ProviderConfig {
  type: ProviderType;
  apiKey: string;
  baseUrl?: string;
  modelId: string;
  transport: ElevenLabsTransport;
  // alias -> provider voice id; empty means any well-formed voice id is accepted
  voices: Readonly<Record<string, string>>;
  defaultVoice?: string;
  maxTextLength: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  healthTtlMs: number;
}

export interface TranscoderConfig {
  ffmpegPath: string;
  maxConcurrent: number;
  killGraceMs: number;
}

export interface PipelineConfig {
  deadlineMs: number;
  minAudioBytes: number;
}

export interface GatewayConfig {
  server: ServerConfig;
  provider: ProviderConfig;
  transcoder: TranscoderConfig;
  pipeline: PipelineConfig;
}

type Env = Record<string, string | undefined>;

// ===== PARSING HELPERS =====

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, name: string, fallback: number, range: { min: number; max: number }): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`Invalid ${name}: "${raw}" is not an integer`);
  }
  if (value < range.min || value > range.max) {
    throw new Error(`Invalid ${name}: ${value}. Must be between ${range.min} and ${range.max}.`);
  }
  return value;
}

function readChoice<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;
  const match = choices.find((choice) => choice === raw.toLowerCase());
  if (!match) {
    throw new Error(`Invalid ${name}: "${raw}". Expected one of ${choices.join(', ')}.`);
  }
  return match;
}

export function parseVoiceMap(raw: string | undefined): Record<string, string> {
  const voices: Record<string, string> = {};
  if (!raw) return voices;
  for (const entry of raw.split(',')) {
    const pair = entry.trim();
    if (!pair) continue;
    const eq = pair.indexOf('=');
    const alias = eq === -1 ? pair : pair.slice(0, eq).trim();
    const voiceId = eq === -1 ? pair : pair.slice(eq + 1).trim();
    if (!alias || !voiceId) {
      throw new Error(`Invalid VOICES entry: "${pair}". Expected alias=voiceId.`);
    }
    voices[alias] = voiceId;
  }
  return voices;
}

// ===== CONFIGURATION LOADING =====

function loadServerConfig(env: Env): ServerConfig {
  const level = readString(env, 'LOG_LEVEL') ?? 'info';
  if (!isLogLevel(level)) {
    throw new Error(`Invalid LOG_LEVEL: "${level}". Expected debug, info, warn or error.`);
  }
  const accessKey = readString(env, 'GATEWAY_ACCESS_KEY');
  if (env.NODE_ENV === 'production' && !accessKey) {
    throw new Error('GATEWAY_ACCESS_KEY environment variable is required in production');
  }
  return {
    port: readInt(env, 'PORT', 8000, { min: 1, max: 65535 }),
    host: readString(env, 'HOST') ?? '0.0.0.0',
    logLevel: level,
    accessKey,
    maxBodyBytes: readInt(env, 'MAX_BODY_BYTES', 65536, { min: 1024, max: 10 * 1024 * 1024 }),
    maxRefBytes: readInt(env, 'MAX_REF_BYTES', 10 * 1024 * 1024, { min: 1024, max: 100 * 1024 * 1024 }),
    shutdownGraceMs: readInt(env, 'SHUTDOWN_GRACE_MS', 10_000, { min: 0, max: 120_000 }),
  };
}

function loadProviderConfig(env: Env): ProviderConfig {
  const type = readChoice<ProviderType>(env, 'TTS_PROVIDER', ['elevenlabs', 'openai'], 'elevenlabs');
  const keyName = type === 'elevenlabs' ? 'ELEVENLABS_API_KEY' : 'OPENAI_API_KEY';
  const apiKey = readString(env, keyName);
  if (!apiKey) {
    throw new Error(`${keyName} environment variable is required`);
  }
  log.info(`${keyName} loaded:`, redact(apiKey));

  const voices = parseVoiceMap(readString(env, 'VOICES'));
  const defaultVoice = readString(env, 'DEFAULT_VOICE');
  const backoffBaseMs = readInt(env, 'PROVIDER_BACKOFF_BASE_MS', 300, { min: 1, max: 60_000 });
  const backoffMaxMs = readInt(env, 'PROVIDER_BACKOFF_MAX_MS', 5000, { min: 1, max: 300_000 });
  if (backoffMaxMs < backoffBaseMs) {
    throw new Error(`Invalid PROVIDER_BACKOFF_MAX_MS: ${backoffMaxMs}. Must not be below PROVIDER_BACKOFF_BASE_MS (${backoffBaseMs}).`);
  }

  return {
    type,
    apiKey,
    baseUrl: readString(env, type === 'elevenlabs' ? 'ELEVENLABS_BASE_URL' : 'OPENAI_BASE_URL'),
    modelId: readString(env, type === 'elevenlabs' ? 'ELEVENLABS_MODEL_ID' : 'OPENAI_TTS_MODEL')
      ?? (type === 'elevenlabs' ? 'eleven_multilingual_v2' : 'gpt-4o-mini-tts'),
    transport: readChoice<ElevenLabsTransport>(env, 'ELEVENLABS_TRANSPORT', ['http', 'websocket'], 'http'),
    voices,
    defaultVoice,
    maxTextLength: readInt(env, 'MAX_TEXT_LENGTH', MAX_TEXT_LENGTH, { min: 1, max: MAX_TEXT_LENGTH }),
    maxAttempts: readInt(env, 'PROVIDER_MAX_ATTEMPTS', 3, { min: 1, max: 10 }),
    backoffBaseMs,
    backoffMaxMs,
    healthTtlMs: readInt(env, 'PROVIDER_HEALTH_TTL_MS', 30_000, { min: 0, max: 600_000 }),
  };
}

function loadTranscoderConfig(env: Env): TranscoderConfig {
  return {
    ffmpegPath: readString(env, 'FFMPEG_PATH') ?? 'ffmpeg',
    maxConcurrent: readInt(env, 'MAX_TRANSCODERS', 4, { min: 1, max: 256 }),
    killGraceMs: readInt(env, 'TRANSCODER_KILL_GRACE_MS', 2000, { min: 0, max: 60_000 }),
  };
}

function loadPipelineConfig(env: Env): PipelineConfig {
  return {
    deadlineMs: readInt(env, 'REQUEST_DEADLINE_MS', 60_000, { min: 100, max: 600_000 }),
    minAudioBytes: readInt(env, 'MIN_AUDIO_BYTES', 100, { min: 0, max: 1024 * 1024 }),
  };
}

// ===== MAIN CONFIGURATION LOADER =====

/**
 * Reads the environment once. The result is frozen and handed to each
 * component's constructor; nothing reads process.env after startup.
 */
export function loadGatewayConfig(env: Env = process.env): GatewayConfig {
  try {
    const config: GatewayConfig = {
      server: Object.freeze(loadServerConfig(env)),
      provider: Object.freeze(loadProviderConfig(env)),
      transcoder: Object.freeze(loadTranscoderConfig(env)),
      pipeline: Object.freeze(loadPipelineConfig(env)),
    };

    log.info('Gateway configuration loaded successfully');
    log.info('Server:', `${config.server.host}:${config.server.port}`, 'access key:', config.server.accessKey ? 'set' : 'none');
    log.info('Provider:', config.provider.type, 'model:', config.provider.modelId, 'voices:', Object.keys(config.provider.voices).length || 'any');
    log.info('Request deadline:', config.pipeline.deadlineMs + 'ms', 'max transcoders:', config.transcoder.maxConcurrent);

    return Object.freeze(config);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    log.error('Failed to load gateway configuration:', msg);
    throw error;
  }
}
