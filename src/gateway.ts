import * as http from 'http';
import type { AddressInfo } from 'net';
import type { WebSocketServer } from 'ws';
import { CancelledError } from './errors';
import type { GatewayConfig } from './gateway-config';
import { createRequestHandler } from './http-handler';
import { AdmissionCounter } from './lib/admission';
import { ProviderFactory } from './providers/factory';
import { canCloneVoices, type TTSProvider } from './providers/tts/base';
import { ProviderHealth } from './router/provider-health';
import { SynthesisPipeline } from './synthesis-pipeline';
import { FfmpegTranscoder, type SpawnTranscoder, type Transcoder } from './transcoder';
import { createLogger } from './utils/logger';
import { attachStreamServer, STREAM_PATH } from './ws-handler';

const log = createLogger('gateway');

export interface GatewayOverrides {
  provider?: TTSProvider;
  transcoder?: Transcoder;
  spawn?: SpawnTranscoder;
}

export interface Gateway {
  server: http.Server;
  wss: WebSocketServer;
  pipeline: SynthesisPipeline;
  admission: AdmissionCounter;
  listen(port?: number, host?: string): Promise<AddressInfo>;
  shutdown(): Promise<void>;
}

/** Wires provider, transcoder, pipeline and both surfaces from a loaded config. */
export function createGateway(config: GatewayConfig, overrides: GatewayOverrides = {}): Gateway {
  const provider = overrides.provider ?? ProviderFactory.createTTS(config.provider);
  const admission = new AdmissionCounter(config.transcoder.maxConcurrent);
  const transcoder =
    overrides.transcoder ??
    new FfmpegTranscoder({
      ffmpegPath: config.transcoder.ffmpegPath,
      admission,
      killGraceMs: config.transcoder.killGraceMs,
      spawn: overrides.spawn,
    });
  const pipeline = new SynthesisPipeline({ provider, transcoder, deadlineMs: config.pipeline.deadlineMs });
  const health = new ProviderHealth(provider, { ttlMs: config.provider.healthTtlMs });
  const shutdownController = new AbortController();

  const server = http.createServer(
    createRequestHandler({
      pipeline,
      health,
      accessKey: config.server.accessKey,
      maxBodyBytes: config.server.maxBodyBytes,
      minAudioBytes: config.pipeline.minAudioBytes,
      cloner: canCloneVoices(provider) ? provider : undefined,
      maxRefBytes: config.server.maxRefBytes,
      cloneTimeoutMs: config.pipeline.deadlineMs,
      shutdownSignal: shutdownController.signal,
    })
  );
  const wss = attachStreamServer(server, {
    pipeline,
    accessKey: config.server.accessKey,
    maxBodyBytes: config.server.maxBodyBytes,
    shutdownSignal: shutdownController.signal,
  });

  const listen = (port = config.server.port, host = config.server.host): Promise<AddressInfo> =>
    new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not listening on a TCP port'));
          return;
        }
        log.info(`Server started on ${address.address}:${address.port}`);
        log.info(`Synthesize: POST http://${host}:${address.port}/v1/synthesize`);
        log.info(`Stream: ws://${host}:${address.port}${STREAM_PATH}`);
        resolve(address);
      });
    });

  let closing: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    closing ??= (async () => {
      log.info('Shutting down: cancelling in-flight jobs');
      shutdownController.abort(new CancelledError('Server shutting down'));
      for (const client of wss.clients) client.close(1001, 'server shutting down');

      const closed = new Promise<void>((resolve) => {
        wss.close(() => server.close(() => resolve()));
      });
      const timer = setTimeout(() => {
        log.warn(`Connections still open after ${config.server.shutdownGraceMs}ms; closing them`);
        server.closeAllConnections();
        for (const client of wss.clients) client.terminate();
      }, config.server.shutdownGraceMs);
      timer.unref();
      server.closeIdleConnections();
      await closed;
      clearTimeout(timer);
      log.info('Shutdown complete');
    })();
    return closing;
  };

  return { server, wss, pipeline, admission, listen, shutdown };
}
