export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Caps the complete commands `runBridge` keeps in flight for one batch
 * (`BRIDGE_COMMIT_CONCURRENCY`). Waiting commits start in the order their records were polled.
 */
export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const waiting: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const start = waiting.shift();
    if (!start) return;
    active += 1;
    start();
  };

  return <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      waiting.push(() => {
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            active -= 1;
            next();
          });
      });
      next();
    });
};
