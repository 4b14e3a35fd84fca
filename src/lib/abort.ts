/**
 * Races a promise against an abort signal. The original promise keeps
 * running; callers release its resources through the same signal.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    // attached first so a late rejection of `promise` is always observed
    promise.then(
      (value) => { signal.removeEventListener('abort', onAbort); resolve(value); },
      (error: unknown) => { signal.removeEventListener('abort', onAbort); reject(error); }
    );
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

// Aborts `target` whenever any of `sources` aborts, with the same reason
export function linkSignals(target: AbortController, ...sources: Array<AbortSignal | undefined>): () => void {
  const cleanups: Array<() => void> = [];
  for (const source of sources) {
    if (!source) continue;
    if (source.aborted) {
      target.abort(source.reason);
      break;
    }
    const onAbort = () => target.abort(source.reason);
    source.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => source.removeEventListener('abort', onAbort));
  }
  return () => { for (const cleanup of cleanups) cleanup(); };
}
