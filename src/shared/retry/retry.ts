export type RetryContext = {
  attempt: number;
  maxAttempts: number;
  error: unknown;
};

export type RetryOptions = {
  retries: number;          // extra attempts after the first one
  minDelayMs: number;       // base of the exponential backoff
  maxDelayMs: number;       // cap for a single wait
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (ctx: RetryContext & { delayMs: number }) => void;
  onGiveUp?: (ctx: RetryContext) => void;
  randomFn?: () => number;
  jitterRatio?: number;
};

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

export const backoffDelay = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "randomFn" | "jitterRatio">
): number => {
  const { minDelayMs, maxDelayMs, randomFn = Math.random, jitterRatio = 0.2 } = opts;
  const backoff = Math.min(maxDelayMs, minDelayMs * Math.pow(2, attempt));
  const ratio = Math.min(1, Math.max(0, jitterRatio));
  const random = Math.min(1, Math.max(0, randomFn()));
  return backoff + Math.floor(backoff * ratio * random);
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, onRetry, onGiveUp } = opts;
  const maxAttempts = retries + 1;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= retries || !shouldRetry(err)) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const delayMs = backoffDelay(attempt, opts);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error: err });
      await sleep(delayMs);
    }
  }
};
