/**
 * Single-retry helper shared by the web clients
 */

import { isRetryableError, type ChildLogger } from "@deepsearch/core";

export interface RetryOptions {
  /** Wait before the second attempt */
  delayMs: number;

  /** Decides whether a failure earns the second attempt */
  shouldRetry?: (error: unknown) => boolean;

  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;

  log?: ChildLogger;
  meta?: Record<string, unknown>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run an operation, retrying exactly once on a retryable failure.
 * The second failure propagates unchanged.
 */
export async function withSingleRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  const wait = options.sleep ?? sleep;

  try {
    return await operation();
  } catch (error) {
    if (!shouldRetry(error)) {
      throw error;
    }

    options.log?.warn("Transient failure, retrying once", {
      ...options.meta,
      delayMs: options.delayMs,
      error: error instanceof Error ? error.message : String(error),
    });

    await wait(options.delayMs);
    return operation();
  }
}
