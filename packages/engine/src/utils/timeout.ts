import { abortReason } from './async';

interface WithTimeoutInput<T> {
  timeoutMs: number;
  run: (signal: AbortSignal) => Promise<T>;
  /** Builds the error the call rejects with when the bound is exceeded. */
  onTimeout: () => Error;
  /** Parent signal; aborting it aborts the operation with the parent's reason. */
  signal?: AbortSignal;
}

/**
 * Runs an abortable operation under a time bound. On timeout or parent abort,
 * the signal handed to `run` is aborted so the operation can stop its I/O.
 */
export async function withTimeout<T>(input: WithTimeoutInput<T>): Promise<T> {
  const parent = input.signal;
  if (parent?.aborted) {
    throw abortReason(parent);
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let unlink: (() => void) | undefined;

  try {
    return await Promise.race([
      input.run(controller.signal),
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => {
          const error = input.onTimeout();
          controller.abort(error);
          reject(error);
        }, input.timeoutMs);

        if (parent) {
          const onAbort = () => {
            const reason = abortReason(parent);
            controller.abort(reason);
            reject(reason);
          };
          parent.addEventListener('abort', onAbort, { once: true });
          unlink = () => parent.removeEventListener('abort', onAbort);
        }
      })
    ]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
    unlink?.();
  }
}
