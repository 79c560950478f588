/**
 * Exponential backoff for collaborators that talk to remote services.
 * The conversation core never retries on its own; a failed step becomes a summary.
 */

/**
 * Backoff schedule for one call site
 */
export interface RetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

/**
 * Per-call behavior layered over the schedule
 */
export interface RetryOptions {
  /** Service name used in progress messages, e.g. "Gemini" */
  label?: string;
  /** Decides whether a failure is transient; defaults to {@link isRetryableError} */
  shouldRetry?: (error: unknown) => boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,      // 1s, 2s, 4s
  maxDelayMs: 10000,
  backoffMultiplier: 2,
};

const TRANSIENT_NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'ECONNREFUSED']);

/**
 * True for rate limiting (429), an unavailable service (503) and dropped
 * connections. Anything else is a real failure and is thrown at once.
 */
export function isRetryableError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }

  if ('status' in error && (error.status === 503 || error.status === 429)) {
    return true;
  }

  return 'code' in error && typeof error.code === 'string' && TRANSIENT_NETWORK_CODES.has(error.code);
}

/**
 * Delay before the retry that follows `attempt` (0-indexed), capped at maxDelayMs
 */
export function backoffDelay(attempt: number, config: RetryConfig): number {
  const delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt);
  return Math.min(delay, config.maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function describeFailure(error: unknown): string {
  if (typeof error === 'object' && error !== null) {
    if ('status' in error && typeof error.status === 'number') return `status ${error.status}`;
    if ('code' in error && typeof error.code === 'string') return error.code;
  }
  return 'transient error';
}

/**
 * Runs `fn`, retrying transient failures on the configured schedule.
 *
 * @param fn The call to attempt; invoked once per attempt
 * @param config Backoff schedule (defaults to 3 retries, 1s doubling to 10s)
 * @param options Progress label and retry predicate
 * @returns The first successful result
 * @throws The first non-retryable error, or the last error once retries run out
 *
 * @example
 * ```typescript
 * const result = await retryWithBackoff(() => model.generateContent(prompt), DEFAULT_RETRY_CONFIG, {
 *   label: 'Gemini',
 * });
 * ```
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const label = options.label ?? 'Service';
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  let lastError: unknown;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    try {
      const result = await fn();
      if (attempt > 0) {
        console.log(`✓ ${label} call succeeded on attempt ${attempt + 1}`);
      }
      return result;
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error)) {
        throw error;
      }

      if (attempt < config.maxRetries) {
        const delay = backoffDelay(attempt, config);
        console.log(
          `⚠️  ${label} unavailable (${describeFailure(error)}). Retrying in ${delay / 1000}s... (attempt ${attempt + 1}/${config.maxRetries})`
        );
        await sleep(delay);
      } else {
        console.log(`❌ ${label}: all ${config.maxRetries} retry attempts failed`);
      }
    }
  }

  // Retries exhausted
  throw lastError;
}
