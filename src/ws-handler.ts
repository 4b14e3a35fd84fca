import type * as http from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import {
  AUDIO_FORMAT_INFO,
  ClientMessageSchema,
  encodeBinaryFrame,
  nowTs,
  type ErrorEvent,
  type SynthesizeStart,
  type TTSChunkHeader,
  type TTSEnd,
} from '@speech-gateway/types';
import { CancelledError, GatewayError, InvalidRequestError, toErrorBody, toGatewayError } from './errors';
import { isAuthorized } from './http-handler';
import { linkSignals, raceAbort } from './lib/abort';
import type { SynthesisJob } from './synthesis-job';
import type { SynthesisPipeline } from './synthesis-pipeline';
import { createLogger } from './utils/logger';

const log = createLogger('ws');

export const STREAM_PATH = '/v1/stream';

export interface StreamServerDeps {
  pipeline: SynthesisPipeline;
  accessKey?: string;
  maxBodyBytes: number;
  shutdownSignal?: AbortSignal;
}

interface ActiveJob {
  requestId: string;
  controller: AbortController;
}

function sendJson(ws: WebSocket, msg: TTSEnd | ErrorEvent): void {
  if (ws.readyState !== WebSocket.OPEN) return;
  ws.send(JSON.stringify(msg));
}

function sendError(ws: WebSocket, requestId: string, error: GatewayError, jobId?: string): void {
  sendJson(ws, { type: 'error', ts: nowTs(), requestId, data: toErrorBody(error, jobId).error });
}

// Resolves once the frame is handed to the socket; awaiting it keeps one frame in flight.
// Rejects with the job's abort reason if the client stops reading past the deadline.
function sendFrame(ws: WebSocket, frame: Buffer, signal: AbortSignal): Promise<void> {
  const sent = new Promise<void>((resolve, reject) => {
    ws.send(frame, { binary: true }, (err) => (err ? reject(err) : resolve()));
  });
  return raceAbort(sent, signal);
}

function rawToText(raw: WebSocket.RawData): string {
  if (Buffer.isBuffer(raw)) return raw.toString('utf8');
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf8');
  return Buffer.from(raw).toString('utf8');
}

/**
 * One client socket. Runs at most one job at a time; the job is cancelled
 * by `synthesize.cancel`, socket close, or gateway shutdown.
 */
class StreamSession {
  private active: ActiveJob | null = null;

  constructor(private readonly ws: WebSocket, private readonly deps: StreamServerDeps) {
    ws.on('message', (raw, isBinary) => this.onMessage(raw, isBinary));
    ws.on('close', () => {
      if (this.active) log.debug(`socket closed; cancelling request ${this.active.requestId}`);
      this.active?.controller.abort();
    });
    ws.on('error', (e: Error) => log.warn('socket error:', e.message));
  }

  private onMessage(raw: WebSocket.RawData, isBinary: boolean): void {
    if (isBinary) {
      sendError(this.ws, 'unknown', new InvalidRequestError('Binary frames are not accepted'));
      return;
    }
    let msg: unknown;
    try {
      msg = JSON.parse(rawToText(raw));
    } catch {
      sendError(this.ws, 'unknown', new InvalidRequestError('Message must be valid JSON'));
      return;
    }
    const parsed = ClientMessageSchema.safeParse(msg);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join('.') || 'message'}: ${issue.message}` : 'invalid message';
      sendError(this.ws, 'unknown', new InvalidRequestError(detail));
      return;
    }

    const message = parsed.data;
    switch (message.type) {
      case 'synthesize.start':
        if (this.active) {
          sendError(this.ws, message.requestId, new InvalidRequestError(`Request ${this.active.requestId} is still running`));
          return;
        }
        this.start(message);
        return;
      case 'synthesize.cancel':
        if (this.active?.requestId === message.requestId) {
          this.active.controller.abort();
        } else {
          log.debug(`cancel for unknown request ${message.requestId}`);
        }
        return;
    }
  }

  private start(message: SynthesizeStart): void {
    const controller = new AbortController();
    const active: ActiveJob = { requestId: message.requestId, controller };
    this.active = active;
    void this.run(message, controller)
      .catch((e: unknown) => {
        log.error('stream job crashed:', e instanceof Error ? e.stack ?? e.message : String(e));
        sendError(this.ws, message.requestId, toGatewayError(e));
      })
      .finally(() => {
        if (this.active === active) this.active = null;
      });
  }

  private async run(message: SynthesizeStart, controller: AbortController): Promise<void> {
    const { ws, deps } = this;
    const { requestId } = message;
    const unlink = linkSignals(controller, deps.shutdownSignal);
    let job: SynthesisJob | undefined;
    let chunks = 0;
    let bytes = 0;
    let sending = false;
    try {
      const run = deps.pipeline.start(message.data, controller.signal);
      job = run.job;
      const mime = AUDIO_FORMAT_INFO[job.request.format].mime;
      for await (const chunk of run.chunks) {
        const header: TTSChunkHeader = { type: 'tts.chunk', ts: nowTs(), requestId, jobId: job.id, seq: chunk.seq, mime };
        sending = true;
        await sendFrame(ws, encodeBinaryFrame(header, chunk.data), job.signal);
        sending = false;
        chunks++;
        bytes += chunk.data.length;
      }
      sendJson(ws, { type: 'tts.end', ts: nowTs(), requestId, data: { jobId: job.id, reason: 'complete', chunks, bytes } });
    } catch (error) {
      const failure = job?.error ?? toGatewayError(error);
      if (failure instanceof CancelledError) {
        if (job) {
          sendJson(ws, { type: 'tts.end', ts: nowTs(), requestId, data: { jobId: job.id, reason: 'cancelled', chunks, bytes } });
        }
        return;
      }
      if (sending) {
        // frames are still queued behind a client that stopped reading; nothing more can reach it
        log.warn(`request ${requestId} failed while the client was not reading (${failure.code}); terminating socket`);
        ws.terminate();
        return;
      }
      sendError(ws, requestId, failure, job?.id);
    } finally {
      unlink();
    }
  }
}

/** Socket surface on the gateway's HTTP server. Auth is checked at upgrade. */
export function attachStreamServer(server: http.Server, deps: StreamServerDeps): WebSocketServer {
  const wss = new WebSocketServer({
    server,
    path: STREAM_PATH,
    maxPayload: deps.maxBodyBytes,
    verifyClient: (info: { req: http.IncomingMessage }) => isAuthorized(deps.accessKey, info.req.headers['x-api-key']),
  });
  wss.on('connection', (ws, req) => {
    log.debug('connection from', req.socket.remoteAddress);
    new StreamSession(ws, deps);
  });
  return wss;
}
