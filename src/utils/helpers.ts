/**
 * Utility Helper Functions
 */

import { Logger } from './logger';

export const sleep = (ms: number): Promise<void> =>
    new Promise(resolve => setTimeout(resolve, ms));

export interface RetryOptions {
    maxAttempts?: number;
    initialDelay?: number;
    /** Upper bound for a single backoff wait (ms) */
    maxDelay?: number;
    /** Return false to fail immediately without further attempts */
    shouldRetry?: (error: Error) => boolean;
}

/**
 * Retry an async function with exponential backoff
 */
export async function retryWithBackoff<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const { maxAttempts = 3, initialDelay = 1000, maxDelay = 10000, shouldRetry } = options;
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            return await fn();
        } catch (err) {
            lastError = err instanceof Error ? err : new Error(String(err));

            if (attempt === maxAttempts || (shouldRetry && !shouldRetry(lastError))) {
                Logger.debug(`Giving up after ${attempt} attempt(s):`, lastError.message);
                throw lastError;
            }

            const backoffDelay = Math.min(initialDelay * Math.pow(2, attempt - 1), maxDelay);
            Logger.warn(`Attempt ${attempt} failed, retrying in ${backoffDelay}ms...`);
            await sleep(backoffDelay);
        }
    }

    throw lastError ?? new Error('retryWithBackoff called with maxAttempts < 1');
}
