/* eslint-disable functional/no-let -- Stateful runtime: mutations architecturally required */
import { Logger } from '../logger/Logger';
import { Clock, SystemClock } from './time/Clock';

export interface RetryOptions {
  /** Retries after the first attempt; total attempts = maxRetries + 1 */
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffFactor?: number;
  retryableErrors?: (error: unknown) => boolean;
  clock?: Clock;
  logger?: Logger;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'clock' | 'logger'>> = {
  maxRetries: 2,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffFactor: 2,
  retryableErrors: () => true,
};

const defaultClock = new SystemClock();

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run `operation`, retrying failures with bounded exponential backoff.
 *
 * Only use for idempotent operations. Order placement must never pass
 * through here.
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {},
  context: string = 'Operation',
): Promise<T> {
  const config = { ...DEFAULT_OPTIONS, ...options };
  const clock = options.clock ?? defaultClock;
  const logger = options.logger ?? Logger.getInstance('retry-util');
  let attempt = 0;
  let delay = config.initialDelayMs;

  while (true) {
    try {
      return await operation();
    } catch (error) {
      attempt++;

      if (!config.retryableErrors(error)) {
        logger.error(`${context} encountered non-retryable error`, asError(error));
        throw error;
      }

      if (attempt > config.maxRetries) {
        logger.error(`${context} failed after ${attempt} attempts`, asError(error));
        throw error;
      }

      logger.warn(
        `${context} failed (Attempt ${attempt}/${config.maxRetries + 1}). Retrying in ${delay}ms...`,
        undefined,
        { error: asError(error).message },
      );

      await clock.sleep(delay);

      delay = Math.min(delay * config.backoffFactor, config.maxDelayMs);
    }
  }
}
