/**
 * Retry utilities for LLM providers
 */

import { ProviderError, RateLimitError } from "./provider.interface";

export interface RetryConfig {
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxRetries: 2,
    baseDelayMs: 500,
    maxDelayMs: 30000,
    jitterFactor: 0.2
};

/**
 * Calculate delay with exponential backoff and jitter
 */
export function calculateBackoff(
    attempt: number,
    config: RetryConfig = DEFAULT_RETRY_CONFIG,
    random: () => number = Math.random
): number {
    const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
    const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);
    const jitter = cappedDelay * config.jitterFactor * (random() * 2 - 1);
    return Math.max(0, cappedDelay + jitter);
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRetryableProviderError(error: Error): boolean {
    return error instanceof ProviderError && error.retryable;
}

/**
 * Retry wrapper with exponential backoff
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: Partial<RetryConfig> = {},
    shouldRetry: (error: Error, attempt: number) => boolean = () => true
): Promise<T> {
    const config = { ...DEFAULT_RETRY_CONFIG, ...options };
    let lastError: Error | undefined;

    for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
        try {
            return await fn();
        } catch (error) {
            lastError = error instanceof Error ? error : new Error(String(error));

            if (attempt >= config.maxRetries || !shouldRetry(lastError, attempt)) {
                throw lastError;
            }

            let delay = calculateBackoff(attempt, config);
            if (lastError instanceof RateLimitError && lastError.retryAfterMs !== undefined) {
                // A wait longer than maxDelayMs is handed back to the caller instead
                if (lastError.retryAfterMs > config.maxDelayMs) {
                    throw lastError;
                }
                delay = Math.max(delay, lastError.retryAfterMs);
            }
            await sleep(delay);
        }
    }

    throw lastError ?? new Error("Retry failed with no error");
}
