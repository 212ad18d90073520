const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 1000;
const DEFAULT_MAX_DELAY_MS = 30_000;
const BACKOFF_MULTIPLIER = 2;

export interface IExponentialBackoffOptions {
  readonly maxAttempts?: number;
  readonly baseDelayMs?: number;
  readonly maxDelayMs?: number;
  readonly shouldRetry: (error: unknown, attempt: number) => boolean;
  readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const sleep = async (delayMs: number): Promise<void> => {
  if (delayMs <= 0) {
    return;
  }

  await new Promise<void>((resolve: () => void): void => {
    setTimeout(resolve, delayMs);
  });
};

const resolvePositiveInteger = (value: number | undefined, fallback: number): number => {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }

  return Math.floor(value);
};

export const executeWithExponentialBackoff = async <TResult>(
  operation: (attempt: number) => Promise<TResult>,
  options: IExponentialBackoffOptions,
): Promise<TResult> => {
  const maxAttempts: number = resolvePositiveInteger(options.maxAttempts, DEFAULT_MAX_ATTEMPTS);
  const maxDelayMs: number = resolvePositiveInteger(options.maxDelayMs, DEFAULT_MAX_DELAY_MS);
  let currentDelayMs: number = Math.min(
    resolvePositiveInteger(options.baseDelayMs, DEFAULT_BASE_DELAY_MS),
    maxDelayMs,
  );
  let lastError: unknown = null;

  for (let attempt: number = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error: unknown) {
      lastError = error;

      if (attempt >= maxAttempts || !options.shouldRetry(error, attempt)) {
        throw error;
      }

      options.onRetry?.(error, attempt, currentDelayMs);
      await sleep(currentDelayMs);
      currentDelayMs = Math.min(currentDelayMs * BACKOFF_MULTIPLIER, maxDelayMs);
    }
  }

  throw lastError;
};
