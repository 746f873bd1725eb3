export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryContext = { attempt: number; maxAttempts: number; error: unknown };

export type RetryOptions = {
  retries: number;          // max attempts after initial try (e.g. 5 means up to 6 total tries)
  minDelayMs: number;       // base delay for backoff
  maxDelayMs: number;       // max delay cap
  shouldRetry: (err: unknown) => RetryDecision;
  // polled before every new attempt; a true value gives up with the last error
  isCancelled?: () => boolean;
  onRetry?: (ctx: RetryContext & { delayMs: number }) => void;
  onGiveUp?: (ctx: RetryContext & { cancelled: boolean }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  sleepFn?: (ms: number) => Promise<void>;
};

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

const normalizeDecision = (decision: RetryDecision): { retry: boolean; delayMs?: number } =>
  typeof decision === "boolean" ? { retry: decision } : decision;

export const computeBackoffMs = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "randomFn" | "jitterRatio">,
  customDelayMs?: number
): number => {
  const { minDelayMs, maxDelayMs, randomFn = Math.random, jitterRatio = 0.2 } = opts;
  const backoff = customDelayMs != null
    ? Math.min(maxDelayMs, customDelayMs)
    : Math.min(maxDelayMs, minDelayMs * Math.pow(2, attempt));
  const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
  const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
  return backoff + Math.floor(backoff * normalizedJitterRatio * normalizedRandom);
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, isCancelled, onRetry, onGiveUp, sleepFn = sleep } = opts;

  const maxAttempts = retries + 1;
  // attempt=0 is first try, then up to retries extra
  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      const decision = normalizeDecision(shouldRetry(err));
      const cancelled = isCancelled?.() ?? false;
      if (attempt >= retries || !decision.retry || cancelled) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err, cancelled });
        throw err;
      }

      const customDelayMs =
        typeof decision.delayMs === "number" && Number.isFinite(decision.delayMs) && decision.delayMs >= 0
          ? decision.delayMs
          : undefined;
      const waitMs = computeBackoffMs(attempt, opts, customDelayMs);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleepFn(waitMs);
    }
  }
};
