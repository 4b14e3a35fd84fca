import * as http from 'http';
import { timingSafeEqual } from 'crypto';
import { once } from 'events';
import { AUDIO_FORMAT_INFO, type AudioChunk, type SynthesisRequest } from '@speech-gateway/types';
import {
  CancelledError,
  GatewayError,
  InvalidRequestError,
  PayloadTooLargeError,
  ProviderError,
  TimeoutError,
  UnauthorizedError,
  toErrorBody,
  toGatewayError,
} from './errors';
import { linkSignals } from './lib/abort';
import type { ReferenceAudio, VoiceCloner } from './providers/tts/base';
import type { ProviderHealth } from './router/provider-health';
import type { SynthesisJob } from './synthesis-job';
import type { SynthesisPipeline } from './synthesis-pipeline';
import { createLogger } from './utils/logger';

const log = createLogger('http');

export const SYNTHESIZE_PATHS = new Set(['/v1/synthesize', '/synthesize']);

export interface HttpHandlerDeps {
  pipeline: SynthesisPipeline;
  health: ProviderHealth;
  accessKey?: string;
  maxBodyBytes: number;
  minAudioBytes: number;
  // present when the provider can clone voices; enables multipart uploads
  cloner?: VoiceCloner;
  maxRefBytes: number;
  cloneTimeoutMs: number;
  // aborted on process shutdown; cancels every in-flight job
  shutdownSignal?: AbortSignal;
}

export type RequestHandler = (req: http.IncomingMessage, res: http.ServerResponse) => void;

// ===== HELPERS =====

export function isAuthorized(expected: string | undefined, provided: string | string[] | undefined): boolean {
  if (!expected) return true;
  if (typeof provided !== 'string') return false;
  const a = Buffer.from(expected, 'utf8');
  const b = Buffer.from(provided, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

function sendJson(res: http.ServerResponse, status: number, body: unknown, headers: http.OutgoingHttpHeaders = {}): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(payload),
    ...headers,
  });
  res.end(payload);
}

function sendError(res: http.ServerResponse, error: GatewayError, jobId?: string): void {
  const headers: http.OutgoingHttpHeaders = {};
  if (error instanceof ProviderError && error.kind === 'rate_limit' && error.retryAfterMs !== undefined) {
    headers['Retry-After'] = String(Math.max(1, Math.ceil(error.retryAfterMs / 1000)));
  }
  if (error instanceof PayloadTooLargeError) headers.Connection = 'close';
  sendJson(res, error.statusCode, toErrorBody(error, jobId), headers);
}

function readRawBody(req: http.IncomingMessage, maxBytes: number): Promise<Buffer> {
  const declared = Number(req.headers['content-length']);
  if (Number.isFinite(declared) && declared > maxBytes) {
    req.resume();
    return Promise.reject(new PayloadTooLargeError(`Body exceeds ${maxBytes} bytes`));
  }
  return new Promise((resolve, reject) => {
    const parts: Buffer[] = [];
    let size = 0;
    const onData = (chunk: Buffer) => {
      size += chunk.length;
      if (size > maxBytes) {
        req.off('data', onData);
        req.resume();
        reject(new PayloadTooLargeError(`Body exceeds ${maxBytes} bytes`));
        return;
      }
      parts.push(chunk);
    };
    req.on('data', onData);
    req.once('error', reject);
    req.once('end', () => {
      if (size > maxBytes) return;
      resolve(Buffer.concat(parts));
    });
  });
}

async function readJsonBody(req: http.IncomingMessage, maxBytes: number): Promise<unknown> {
  const text = (await readRawBody(req, maxBytes)).toString('utf8');
  if (!text.trim()) {
    throw new InvalidRequestError('Body must be a JSON object');
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new InvalidRequestError('Body must be valid JSON');
  }
}

// ===== VOICE CLONING UPLOADS =====

interface CloneUpload {
  fields: Record<string, unknown>;
  sample: ReferenceAudio;
}

function isMultipart(req: http.IncomingMessage): boolean {
  return (req.headers['content-type'] ?? '').toLowerCase().startsWith('multipart/form-data');
}

function formFlag(value: string): boolean | string {
  if (value === 'true' || value === '1' || value === 'on') return true;
  if (value === 'false' || value === '0' || value === 'off') return false;
  // left as a string so validation names the field
  return value;
}

/**
 * multipart/form-data with a `ref_audio` file and the request fields
 * (`text`, optional `format`, `stream`). The reference file is limited to
 * `maxRefBytes`; the other fields share `maxFieldBytes`.
 */
async function readCloneUpload(req: http.IncomingMessage, maxRefBytes: number, maxFieldBytes: number): Promise<CloneUpload> {
  const raw = await readRawBody(req, maxRefBytes + maxFieldBytes);
  const form = await new Request('http://gateway.local/v1/synthesize', {
    method: 'POST',
    headers: { 'content-type': req.headers['content-type'] ?? '' },
    body: raw,
  })
    .formData()
    .catch((e: unknown) => {
      log.debug('multipart parse failed:', e instanceof Error ? e.message : String(e));
      throw new InvalidRequestError('Body must be valid multipart/form-data');
    });

  const ref = form.get('ref_audio');
  if (ref === null || typeof ref === 'string') {
    throw new InvalidRequestError('ref_audio must be an uploaded audio file');
  }
  if (ref.size === 0) throw new InvalidRequestError('ref_audio is empty');
  if (ref.size > maxRefBytes) {
    throw new PayloadTooLargeError(`Reference audio exceeds ${maxRefBytes} bytes`);
  }

  const fields: Record<string, unknown> = {};
  for (const name of ['text', 'format', 'stream']) {
    const value = form.get(name);
    if (typeof value === 'string') fields[name] = name === 'stream' ? formFlag(value) : value;
  }
  return {
    fields,
    sample: {
      data: Buffer.from(await ref.arrayBuffer()),
      filename: ref.name || 'reference',
      mime: ref.type || 'application/octet-stream',
    },
  };
}

async function removeClonedVoice(cloner: VoiceCloner, voiceId: string): Promise<void> {
  try {
    await cloner.deleteVoice(voiceId);
  } catch (e: unknown) {
    log.warn(`could not delete cloned voice ${voiceId}:`, e instanceof Error ? e.message : String(e));
  }
}

function audioHeaders(job: SynthesisJob): http.OutgoingHttpHeaders {
  const info = AUDIO_FORMAT_INFO[job.request.format];
  return {
    'Content-Type': info.mime,
    'Content-Disposition': `attachment; filename="speech.${info.extension}"`,
    'Cache-Control': 'no-store',
    'X-Job-Id': job.id,
  };
}

// Resolves once the response can take more data; rejects if the job is torn down first
async function drain(res: http.ServerResponse, signal: AbortSignal): Promise<void> {
  await once(res, 'drain', { signal });
}

// ===== SYNTHESIS =====

async function streamResponse(res: http.ServerResponse, job: SynthesisJob, chunks: AsyncIterable<AudioChunk>): Promise<void> {
  const iterator = chunks[Symbol.asyncIterator]();
  try {
    // hold the headers until the first chunk so early failures still get a status code
    const first = await iterator.next();
    res.writeHead(200, audioHeaders(job));
    if (!first.done) {
      let next: IteratorResult<AudioChunk> = first;
      while (!next.done) {
        // job.signal also fires on caller abort, so a stalled client cannot outlive the deadline
        if (!res.write(next.value.data)) await drain(res, job.signal);
        next = await iterator.next();
      }
    }
    res.end();
  } finally {
    // settles the job when we stop early (disconnect or deadline while waiting for drain)
    await iterator.return?.();
  }
}

async function bufferedResponse(res: http.ServerResponse, job: SynthesisJob, chunks: AsyncIterable<AudioChunk>, minAudioBytes: number): Promise<void> {
  const parts: Buffer[] = [];
  for await (const chunk of chunks) parts.push(chunk.data);
  const audio = Buffer.concat(parts);
  if (audio.length < minAudioBytes) {
    throw new ProviderError('unavailable', `Synthesized audio is empty or too small (${audio.length} bytes)`);
  }
  res.writeHead(200, { ...audioHeaders(job), 'Content-Length': audio.length });
  res.end(audio);
}

interface CloneStep {
  cloner: VoiceCloner;
  request: SynthesisRequest;
  sample: ReferenceAudio;
}

async function cloneForRequest(step: CloneStep, signal: AbortSignal, timeoutMs: number): Promise<string> {
  const controller = new AbortController();
  const unlink = linkSignals(controller, signal);
  const timer = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);
  try {
    const voice = await step.cloner.cloneVoice(step.sample, controller.signal);
    return voice.voiceId;
  } finally {
    clearTimeout(timer);
    unlink();
  }
}

async function handleSynthesize(req: http.IncomingMessage, res: http.ServerResponse, deps: HttpHandlerDeps): Promise<void> {
  if (!isAuthorized(deps.accessKey, req.headers['x-api-key'])) {
    req.resume();
    throw new UnauthorizedError('Missing or invalid X-API-Key');
  }

  let body: unknown;
  let clone: CloneStep | undefined;
  if (isMultipart(req)) {
    if (!deps.cloner) {
      req.resume();
      throw new InvalidRequestError('Voice cloning is not supported by the configured provider');
    }
    const upload = await readCloneUpload(req, deps.maxRefBytes, deps.maxBodyBytes);
    // a bad request is refused before any voice is created for it
    clone = { cloner: deps.cloner, request: deps.pipeline.validate(upload.fields), sample: upload.sample };
  } else {
    body = await readJsonBody(req, deps.maxBodyBytes);
  }

  const controller = new AbortController();
  const unlink = linkSignals(controller, deps.shutdownSignal);
  const onClose = () => {
    if (!res.writableFinished) controller.abort();
  };
  res.once('close', onClose);

  let job: SynthesisJob | undefined;
  let clonedVoiceId: string | undefined;
  try {
    if (clone) {
      clonedVoiceId = await cloneForRequest(clone, controller.signal, deps.cloneTimeoutMs);
      body = { ...clone.request, voice: clonedVoiceId };
    }
    const run = deps.pipeline.start(body, controller.signal);
    job = run.job;
    if (job.request.stream) {
      await streamResponse(res, job, run.chunks);
    } else {
      await bufferedResponse(res, job, run.chunks, deps.minAudioBytes);
    }
  } catch (error) {
    const failure = job?.error ?? toGatewayError(error);
    if (res.destroyed || (res.writableEnded && !res.writableFinished)) {
      log.debug(`job ${job?.id ?? '-'} ended: client disconnected`);
      return;
    }
    if (failure instanceof CancelledError && !res.headersSent) {
      // still connected, so the cancel came from shutdown
      sendError(res, new ProviderError('unavailable', 'Server is shutting down'), job?.id);
      return;
    }
    if (res.headersSent) {
      // partial audio is already out; truncate the chunked body
      log.warn(`job ${job?.id ?? '-'} failed mid-stream (${failure.code}); closing response`);
      res.destroy();
      return;
    }
    sendError(res, failure, job?.id);
  } finally {
    unlink();
    res.off('close', onClose);
    if (clone && clonedVoiceId) await removeClonedVoice(clone.cloner, clonedVoiceId);
  }
}

// ===== ROUTER =====

export function createRequestHandler(deps: HttpHandlerDeps): RequestHandler {
  const route = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const { pathname } = new URL(req.url ?? '/', 'http://localhost');

    if (pathname === '/healthz') {
      return sendJson(res, 200, { status: 'healthy', timestamp: new Date().toISOString() });
    }

    if (pathname === '/readyz') {
      const report = await deps.health.check();
      return sendJson(res, report.state === 'ready' ? 200 : 503, {
        status: report.state,
        provider: report.provider,
        ...(report.detail ? { detail: report.detail } : {}),
      });
    }

    if (SYNTHESIZE_PATHS.has(pathname)) {
      if (req.method !== 'POST') {
        req.resume();
        return sendJson(res, 405, { error: { code: 'invalid_request', message: 'Use POST', retryable: false } }, { Allow: 'POST' });
      }
      try {
        await handleSynthesize(req, res, deps);
      } catch (error) {
        // failures before a job exists: auth, body size, JSON, upload fields
        sendError(res, toGatewayError(error));
      }
      return;
    }

    req.resume();
    sendJson(res, 404, { error: { code: 'invalid_request', message: `No route for ${req.method} ${pathname}`, retryable: false } });
  };

  return (req, res) => {
    route(req, res).catch((error: unknown) => {
      log.error('Unhandled request error:', error instanceof Error ? error.stack ?? error.message : String(error));
      if (!res.headersSent) {
        sendError(res, toGatewayError(error));
      } else {
        res.destroy();
      }
    });
  };
}
