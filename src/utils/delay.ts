export type Delay = (ms: number, signal?: AbortSignal) => Promise<boolean>;

/**
 * Resolves true after ms, or false as soon as signal aborts.
 */
export const abortableDelay: Delay = (ms, signal) =>
  new Promise<boolean>((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
