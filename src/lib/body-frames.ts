import { createLogger } from '../utils/logger';

const log = createLogger('body');

export type ResponseBody = NonNullable<Response['body']>;

/**
 * Yields a fetch response body frame by frame. Read failures go through
 * `classify`; an abort rethrows the signal's reason. The body is cancelled
 * whenever iteration stops before the end.
 */
export async function* readBodyFrames(
  body: ResponseBody,
  classify: (error: unknown) => Error,
  signal?: AbortSignal
): AsyncGenerator<Buffer> {
  const reader = body.getReader();
  let finished = false;
  try {
    while (true) {
      let result: Awaited<ReturnType<typeof reader.read>>;
      try {
        result = await reader.read();
      } catch (error) {
        if (signal?.aborted) throw signal.reason;
        throw classify(error);
      }
      if (result.done) {
        finished = true;
        return;
      }
      yield Buffer.from(result.value.buffer, result.value.byteOffset, result.value.byteLength);
    }
  } finally {
    if (!finished) {
      await reader.cancel().catch((e: unknown) => {
        log.debug('reader cancel failed:', e instanceof Error ? e.message : String(e));
      });
    }
  }
}
