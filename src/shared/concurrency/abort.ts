import { OperationCancelledError, type CancellableOperation } from "../../ports/OriginClient";

/**
 * Settles with `promise`, or rejects with OperationCancelledError as soon as `signal` aborts.
 * The underlying work is not stopped; only the caller stops waiting for it.
 */
export const raceWithAbort = <T>(
  promise: Promise<T>,
  operation: CancellableOperation,
  signal?: AbortSignal
): Promise<T> => {
  if (!signal) return promise;
  if (signal.aborted) {
    return Promise.reject(new OperationCancelledError(operation, `${operation} aborted`, signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(new OperationCancelledError(operation, `${operation} aborted`, signal.reason));
    };
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
};

/**
 * Waits `ms`, or less when `signal` aborts first. Never rejects.
 */
export const pause = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
