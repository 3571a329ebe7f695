/**
 * Wait for `ms` milliseconds, or until `signal` aborts.
 *
 * Never rejects: an abort resolves the promise early so that polling loops
 * can check their stop condition and exit normally.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}
