import type { IncomingMessage } from 'http';
import { WebSocket, type RawData } from 'ws';
import { ProviderError } from './errors';
import { AsyncQueue } from './lib/async-queue';
import { parseRetryAfter } from './lib/backoff';
import { readBodyFrames } from './lib/body-frames';
import { createLogger } from './utils/logger';

const log = createLogger('elevenlabs');

export const DEFAULT_ELEVENLABS_BASE_URL = 'https://api.elevenlabs.io';

// Pause the socket once this many frames are waiting for the consumer
const SOCKET_HIGH_WATER = 16;
const SOCKET_LOW_WATER = 4;

export type FetchLike = typeof fetch;
export type SocketFactory = (url: string, headers: Record<string, string>) => WebSocket;

export type ElevenLabsStreamOptions = {
  apiKey: string;
  baseUrl?: string;
  voiceId: string;
  text: string;
  modelId: string;
  outputFormat: string; // e.g., 'mp3_44100_128'
  signal?: AbortSignal;
};

// ===== FAILURE CLASSIFICATION =====

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// ElevenLabs error bodies look like {"detail": {"status": "quota_exceeded", "message": "..."}}
function readErrorDetail(bodyText: string): { status?: string; message: string } {
  const parsed = parseJson(bodyText);
  if (isRecord(parsed)) {
    const detail = parsed.detail;
    if (typeof detail === 'string') return { message: detail };
    if (isRecord(detail)) {
      return {
        status: typeof detail.status === 'string' ? detail.status : undefined,
        message: typeof detail.message === 'string' ? detail.message : bodyText,
      };
    }
  }
  return { message: bodyText };
}

export function classifyHttpFailure(status: number, bodyText: string, retryAfter?: string | null): ProviderError {
  const detail = readErrorDetail(bodyText);
  const message = `ElevenLabs request failed (${status}): ${detail.message.slice(0, 200)}`;
  const retryAfterMs = parseRetryAfter(retryAfter);

  if (detail.status === 'quota_exceeded' || /quota/i.test(detail.status ?? '')) {
    return new ProviderError('quota', message, { status });
  }
  if (status === 401 || status === 403) {
    return new ProviderError('auth', message, { status });
  }
  if (status === 429) {
    return new ProviderError('rate_limit', message, { status, retryAfterMs });
  }
  if (status === 408 || status >= 500) {
    return new ProviderError('unavailable', message, { status, retryAfterMs });
  }
  return new ProviderError('malformed_input', message, { status });
}

export function classifyNetworkFailure(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  const cause = isRecord(error) && isRecord(error.cause) ? error.cause : undefined;
  const code = cause && typeof cause.code === 'string' ? ` (${cause.code})` : '';
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError('unavailable', `ElevenLabs connection failed${code}: ${message}`, { cause: error });
}

// Errors the stream-input socket reports in-band, e.g. {"error": "quota_exceeded", "message": "..."}
export function classifySocketError(payload: Record<string, unknown>): ProviderError {
  const kind = typeof payload.error === 'string' ? payload.error : '';
  const text = typeof payload.message === 'string' ? payload.message : kind || 'unknown error';
  const message = `ElevenLabs stream error: ${text.slice(0, 200)}`;
  const haystack = `${kind} ${text}`;
  if (/quota/i.test(haystack)) return new ProviderError('quota', message);
  if (/auth|api[_ ]key|unauthori[sz]ed/i.test(haystack)) return new ProviderError('auth', message);
  if (/rate|too_many|busy/i.test(haystack)) return new ProviderError('rate_limit', message);
  if (/invalid|input|voice/i.test(haystack)) return new ProviderError('malformed_input', message);
  return new ProviderError('unavailable', message);
}

function apiBase(baseUrl?: string): string {
  return (baseUrl || DEFAULT_ELEVENLABS_BASE_URL).replace(/\/+$/, '');
}

async function failureFrom(response: Response): Promise<ProviderError> {
  const bodyText = await response.text().catch((e: unknown) => {
    log.debug('could not read error body:', e instanceof Error ? e.message : String(e));
    return '';
  });
  return classifyHttpFailure(response.status, bodyText, response.headers.get('retry-after'));
}

// ===== HTTP STREAMING TRANSPORT =====

/**
 * POST /v1/text-to-speech/{voice}/stream. Yields body frames as they arrive.
 */
export async function* streamElevenLabsHttp(
  opts: ElevenLabsStreamOptions,
  fetchImpl: FetchLike = fetch
): AsyncGenerator<Buffer> {
  const { apiKey, voiceId, text, modelId, outputFormat, signal } = opts;
  const url = `${apiBase(opts.baseUrl)}/v1/text-to-speech/${encodeURIComponent(voiceId)}/stream?output_format=${encodeURIComponent(outputFormat)}`;
  log.debug('POST', url, 'text.len=', text.length, 'model=', modelId);

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: 'POST',
      headers: {
        'xi-api-key': apiKey,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        text,
        model_id: modelId,
        voice_settings: { stability: 0.5, similarity_boost: 0.75 },
      }),
      signal,
    });
  } catch (error) {
    if (signal?.aborted) throw signal.reason;
    throw classifyNetworkFailure(error);
  }

  if (!response.ok) throw await failureFrom(response);
  if (!response.body) {
    throw new ProviderError('unavailable', 'ElevenLabs returned an empty body', { status: response.status });
  }

  yield* readBodyFrames(response.body, classifyNetworkFailure, signal);
}

// ===== WEBSOCKET STREAMING TRANSPORT =====

export function toSocketBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '').replace(/^http(s?):\/\//i, (_m, s: string) => `ws${s}://`);
}

const defaultSocketFactory: SocketFactory = (url, headers) =>
  new WebSocket(url, { headers, perMessageDeflate: false, handshakeTimeout: 7000 });

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * wss /v1/text-to-speech/{voice}/stream-input. Sends the text in one go and
 * yields each decoded audio message. The socket is paused while the
 * consumer lags and is terminated on every exit path.
 */
export async function* streamElevenLabsSocket(
  opts: ElevenLabsStreamOptions,
  connect: SocketFactory = defaultSocketFactory
): AsyncGenerator<Buffer> {
  const { apiKey, voiceId, text, modelId, outputFormat, signal } = opts;
  if (signal?.aborted) throw signal.reason;

  const base = toSocketBaseUrl(opts.baseUrl || DEFAULT_ELEVENLABS_BASE_URL);
  const url = `${base}/v1/text-to-speech/${encodeURIComponent(voiceId)}/stream-input?model_id=${encodeURIComponent(modelId)}&output_format=${encodeURIComponent(outputFormat)}`;
  log.debug('connecting', url);

  const queue = new AsyncQueue<Buffer>();
  const ws = connect(url, { 'xi-api-key': apiKey });
  let paused = false;

  const onAbort = () => {
    queue.fail(signal?.reason);
    ws.terminate();
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  ws.once('open', () => {
    // protocol: priming message, the text, then an empty string to flush and close
    ws.send(JSON.stringify({ text: ' ', voice_settings: { stability: 0.5, similarity_boost: 0.75 } }));
    ws.send(JSON.stringify({ text: `${text} `, try_trigger_generation: true }));
    ws.send(JSON.stringify({ text: '' }));
  });

  ws.on('message', (data) => {
    const message = parseJson(rawToString(data));
    if (!isRecord(message)) {
      log.debug('ignoring non-JSON message');
      return;
    }
    if (typeof message.audio === 'string' && message.audio.length > 0) {
      queue.push(Buffer.from(message.audio, 'base64'));
      if (!paused && queue.size >= SOCKET_HIGH_WATER) {
        paused = true;
        ws.pause();
      }
    }
    if (message.isFinal === true) {
      queue.end();
      ws.close(1000);
      return;
    }
    if (typeof message.error === 'string' || (typeof message.message === 'string' && message.audio === undefined)) {
      queue.fail(classifySocketError(message));
      ws.close(1000);
    }
  });

  ws.once('unexpected-response', (_req, res: IncomingMessage) => {
    const parts: Buffer[] = [];
    res.on('data', (chunk: Buffer) => parts.push(chunk));
    res.once('end', () => {
      const retryAfter = res.headers['retry-after'];
      queue.fail(classifyHttpFailure(res.statusCode ?? 502, Buffer.concat(parts).toString('utf8'), typeof retryAfter === 'string' ? retryAfter : undefined));
      ws.terminate();
    });
  });

  ws.on('error', (error) => {
    if (queue.isClosed) {
      log.debug('socket error after stream ended:', error.message);
      return;
    }
    queue.fail(classifyNetworkFailure(error));
  });

  ws.once('close', (code, reason) => {
    if (queue.isClosed) return;
    const why = reason.toString('utf8');
    if (code === 1000) {
      queue.end();
    } else if (code === 1008) {
      queue.fail(classifySocketError({ error: why, message: why }));
    } else {
      queue.fail(new ProviderError('unavailable', `ElevenLabs socket closed (${code})${why ? `: ${why}` : ''}`));
    }
  });

  try {
    for await (const frame of queue) {
      yield frame;
      if (paused && queue.size <= SOCKET_LOW_WATER) {
        paused = false;
        ws.resume();
      }
    }
  } finally {
    signal?.removeEventListener('abort', onAbort);
    if (ws.readyState === WebSocket.CONNECTING || ws.readyState === WebSocket.OPEN) {
      ws.terminate();
    }
  }
}

// ===== VOICE CLONING =====

export type ElevenLabsCloneOptions = {
  apiKey: string;
  baseUrl?: string;
  name: string;
  sample: { data: Buffer; filename: string; mime: string };
  signal?: AbortSignal;
};

/**
 * POST /v1/voices/add (instant voice cloning from one reference file).
 * Resolves to the new voice id. Not retried: a repeated call would create a
 * second voice.
 */
export async function addElevenLabsVoice(opts: ElevenLabsCloneOptions, fetchImpl: FetchLike = fetch): Promise<string> {
  const { apiKey, name, sample, signal } = opts;
  const form = new FormData();
  form.append('name', name);
  form.append('files', new Blob([new Uint8Array(sample.data)], { type: sample.mime }), sample.filename);
  log.debug('adding voice', name, 'sample.bytes=', sample.data.length);

  let response: Response;
  try {
    response = await fetchImpl(`${apiBase(opts.baseUrl)}/v1/voices/add`, {
      method: 'POST',
      headers: { 'xi-api-key': apiKey },
      body: form,
      signal,
    });
  } catch (error) {
    if (signal?.aborted) throw signal.reason;
    throw classifyNetworkFailure(error);
  }
  if (!response.ok) throw await failureFrom(response);

  const payload: unknown = await response.json().catch((e: unknown) => {
    log.debug('could not parse voice response:', e instanceof Error ? e.message : String(e));
    return undefined;
  });
  if (!isRecord(payload) || typeof payload.voice_id !== 'string' || !payload.voice_id) {
    throw new ProviderError('unavailable', 'ElevenLabs did not return a voice id', { status: response.status });
  }
  return payload.voice_id;
}

export async function deleteElevenLabsVoice(
  apiKey: string,
  voiceId: string,
  baseUrl?: string,
  fetchImpl: FetchLike = fetch
): Promise<void> {
  let response: Response;
  try {
    response = await fetchImpl(`${apiBase(baseUrl)}/v1/voices/${encodeURIComponent(voiceId)}`, {
      method: 'DELETE',
      headers: { 'xi-api-key': apiKey },
      signal: AbortSignal.timeout(10_000),
    });
  } catch (error) {
    throw classifyNetworkFailure(error);
  }
  if (!response.ok) throw await failureFrom(response);
  await response.body?.cancel();
}

// ===== HEALTH =====

export async function checkElevenLabsHealth(
  apiKey: string,
  baseUrl: string = DEFAULT_ELEVENLABS_BASE_URL,
  fetchImpl: FetchLike = fetch
): Promise<boolean> {
  const res = await fetchImpl(`${apiBase(baseUrl)}/v1/models`, {
    headers: { 'xi-api-key': apiKey },
    signal: AbortSignal.timeout(2500),
  });
  await res.body?.cancel();
  return res.ok;
}
