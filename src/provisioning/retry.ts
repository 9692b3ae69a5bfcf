import { PermanentProviderError, TransientProviderError, errorMessage, errorName } from '../errors';
import { Logger } from '../types';

export interface RetryOptions {
  /** Maximum number of attempts (including the first). Default: 3 */
  maxAttempts?: number;
  /** Initial delay in ms before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay cap in ms. Default: 30000 */
  maxDelayMs?: number;
  /** Jitter factor (0–1). Default: 0.2 */
  jitterFactor?: number;
  /** Only retry if this returns true for the error. Default: TransientProviderError only */
  retryIf?: (error: unknown) => boolean;
  /** Label for log messages */
  label?: string;
  logger?: Logger;
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number, jitterFactor: number): number {
  // Exponential backoff: baseDelay * 2^(attempt-1)
  const exponentialDelay = Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
  const jitter = exponentialDelay * jitterFactor * Math.random();
  return Math.round(exponentialDelay + jitter);
}

/**
 * Execute an async function with exponential backoff and jitter.
 *
 * Errors rejected by `retryIf` are rethrown at once. A retryable error that
 * survives every attempt is escalated to a PermanentProviderError.
 *
 * ```ts
 * const arn = await retryWithBackoff(() => client.createFunction(spec), {
 *   maxAttempts: 3,
 *   label: 'createFunction',
 * });
 * ```
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    baseDelayMs = 1000,
    maxDelayMs = 30_000,
    jitterFactor = 0.2,
    retryIf = (error: unknown) => error instanceof TransientProviderError,
    label = 'operation',
    logger = console
  } = opts;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!retryIf(error)) {
        throw error;
      }

      if (attempt >= maxAttempts) {
        throw new PermanentProviderError(
          `${label} still failing after ${maxAttempts} attempts: ${errorMessage(error)}`,
          error
        );
      }

      const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs, jitterFactor);
      logger.warn(
        `[${label}] Attempt ${attempt}/${maxAttempts} failed (${errorName(error)}). ` +
        `Retrying in ${delay}ms...`
      );

      await sleep(delay);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
