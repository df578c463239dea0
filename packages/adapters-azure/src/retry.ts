/**
 * Retry helper for transient Azure failures.
 */

import { sleep } from "@portwarden/core";
import { getErrorDetails } from "./errors";

/**
 * Retry configuration for transient failures
 */
export interface RetryConfig {
  maxAttempts: number;
  delayMs: number;
  backoffMultiplier: number;
  retryableStatusCodes: number[];
  retryableErrors: string[];
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  delayMs: 1000,
  backoffMultiplier: 2,
  retryableStatusCodes: [408, 429, 500, 502, 503, 504],
  retryableErrors: [
    "TooManyRequests",
    "Throttled",
    "ServiceUnavailable",
    "InternalServerError",
    "RetryableError",
    "ECONNRESET",
    "ETIMEDOUT",
    "EAI_AGAIN",
  ],
};

export function isRetryableError(error: unknown, config: RetryConfig = DEFAULT_RETRY_CONFIG): boolean {
  const { statusCode, code, message } = getErrorDetails(error);
  if (statusCode !== undefined && config.retryableStatusCodes.includes(statusCode)) {
    return true;
  }
  return config.retryableErrors.some((e) => code.includes(e) || message.includes(e));
}

/**
 * Execute an async operation with retry logic
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const retryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  let delay = retryConfig.delayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error: unknown) {
      if (attempt >= retryConfig.maxAttempts || !isRetryableError(error, retryConfig)) {
        throw error;
      }
      await sleep(delay);
      delay *= retryConfig.backoffMultiplier;
    }
  }
}
