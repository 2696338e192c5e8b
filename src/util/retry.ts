import { logger } from './logger';

type BackoffOptions = {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
  jitter?: boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
};

const wait = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/** Delay before the attempt following `attempt` (1-based). */
export const backoffDelay = (
  attempt: number,
  { initialDelayMs = 500, maxDelayMs = 30_000, factor = 2, jitter = true }: BackoffOptions = {},
  random: () => number = Math.random,
): number => {
  const cappedDelay = Math.min(initialDelayMs * factor ** (attempt - 1), maxDelayMs);

  return jitter
    ? Math.round(cappedDelay / 2 + random() * (cappedDelay / 2))
    : Math.round(cappedDelay);
};

/**
 * Runs `action` until it resolves, `shouldRetry` declines, or `maxAttempts`
 * is reached. With `maxAttempts: 1` the action runs exactly once.
 */
export const exponentialBackoff = async <T>(
  action: (attempt: number) => Promise<T>,
  options: BackoffOptions = {},
): Promise<T> => {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 5);
  const { onRetry, shouldRetry } = options;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await action(attempt);
    } catch (error) {
      if (attempt >= maxAttempts) {
        throw error;
      }

      if (shouldRetry && !shouldRetry(error, attempt)) {
        throw error;
      }

      const delay = backoffDelay(attempt, options);

      if (onRetry) {
        try {
          onRetry(error, attempt, delay);
        } catch (hookError) {
          logger.warn('Retry hook threw an error.', { error: String(hookError) });
        }
      }

      await wait(delay);
    }
  }
};

export type { BackoffOptions };
