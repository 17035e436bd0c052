/**
 * Resilient Fetch - Combines circuit breaker, throttling, and retry logic
 */

import { retryWithBackoff, type RetryOptions } from './helpers';
import { withCircuitBreaker, CircuitOpenError, type CircuitBreakerConfig } from './circuit-breaker';
import { throttledRequest } from './request-throttle';

export interface ResilientFetchConfig {
    retry?: RetryOptions;
    /** Skip circuit breaker (use for configuration-time lookups) */
    skipCircuitBreaker?: boolean;
    /** Errors that count toward opening the circuit (default: all) */
    isCircuitFailure?: (error: unknown) => boolean;
}

/** Default API-specific circuit breaker configs */
export const API_CIRCUIT_CONFIGS: Record<string, Partial<CircuitBreakerConfig>> = {
    'sl-departures': {
        failureThreshold: 3,
        resetTimeout: 60000,
        successThreshold: 1,
        name: 'SL departures',
    },
    'sl-sites': {
        failureThreshold: 2,
        resetTimeout: 120000,
        successThreshold: 1,
        name: 'SL sites',
    },
};

/**
 * Execute an API call with full resilience: throttle -> circuit breaker -> retry
 * Each request key gets its own circuit, configured per API key. The circuit
 * counts one failure per exhausted retry sequence, not per attempt.
 */
export async function resilientFetch<T>(
    apiKey: string,
    requestKey: string,
    fn: () => Promise<T>,
    config: ResilientFetchConfig = {}
): Promise<T> {
    const key = `${apiKey}:${requestKey}`;
    const executeWithRetry = () => retryWithBackoff(fn, config.retry);

    const executeWithCircuitBreaker = config.skipCircuitBreaker
        ? executeWithRetry
        : () =>
              withCircuitBreaker(
                  key,
                  executeWithRetry,
                  API_CIRCUIT_CONFIGS[apiKey],
                  config.isCircuitFailure
              );

    return throttledRequest(key, executeWithCircuitBreaker);
}

export { CircuitOpenError };
export { getCircuitBreakerStatus, resetCircuitBreaker } from './circuit-breaker';
export { getThrottleStatus } from './request-throttle';
