/**
 * Circuit Breaker
 * Stops hammering an API that keeps failing; one breaker per API key.
 */

import { Logger } from './logger';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
    /** Consecutive failures before the circuit opens */
    failureThreshold: number;
    /** Time in ms before a trial call is let through */
    resetTimeout: number;
    /** Successful trial calls needed to close again */
    successThreshold: number;
    name?: string;
}

export interface CircuitBreakerStatus {
    exists: boolean;
    state: CircuitState;
    failures: number;
    successes: number;
    nextAttemptTime: number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
    failureThreshold: 3,
    resetTimeout: 30000,
    successThreshold: 1,
};

/** Error thrown when circuit is open */
export class CircuitOpenError extends Error {
    constructor(
        public readonly circuitKey: string,
        public readonly retryAfter: number
    ) {
        super(`Circuit breaker open for ${circuitKey}. Retry after ${retryAfter}ms`);
        this.name = 'CircuitOpenError';
    }
}

class CircuitBreaker {
    private state: CircuitState = 'CLOSED';
    private failures = 0;
    private successes = 0;
    private nextAttemptTime = 0;

    constructor(
        private readonly key: string,
        private config: CircuitBreakerConfig
    ) {}

    private get label(): string {
        return this.config.name ?? this.key;
    }

    configure(config: CircuitBreakerConfig): void {
        this.config = config;
    }

    /** Throws CircuitOpenError while the circuit is open */
    admit(now: number): void {
        if (this.state !== 'OPEN') {
            return;
        }
        if (now < this.nextAttemptTime) {
            throw new CircuitOpenError(this.key, this.nextAttemptTime - now);
        }
        this.state = 'HALF_OPEN';
        this.successes = 0;
        Logger.info(`Circuit ${this.label} entering half-open state`);
    }

    onSuccess(): void {
        if (this.state === 'HALF_OPEN') {
            this.successes++;
            if (this.successes < this.config.successThreshold) {
                return;
            }
            this.state = 'CLOSED';
            this.successes = 0;
            Logger.success(`Circuit ${this.label} closed (recovered)`);
        }
        this.failures = 0;
    }

    onFailure(now: number): void {
        this.failures++;

        if (this.state === 'HALF_OPEN' || this.failures >= this.config.failureThreshold) {
            const reopened = this.state === 'HALF_OPEN';
            this.state = 'OPEN';
            this.nextAttemptTime = now + this.config.resetTimeout;
            Logger.warn(
                reopened
                    ? `Circuit ${this.label} re-opened after half-open failure`
                    : `Circuit ${this.label} opened after ${this.failures} failures`
            );
        }
    }

    status(): CircuitBreakerStatus {
        return {
            exists: true,
            state: this.state,
            failures: this.failures,
            successes: this.successes,
            nextAttemptTime: this.nextAttemptTime,
        };
    }
}

const circuitBreakers = new Map<string, CircuitBreaker>();

function getBreaker(key: string, config: CircuitBreakerConfig): CircuitBreaker {
    let breaker = circuitBreakers.get(key);
    if (!breaker) {
        breaker = new CircuitBreaker(key, config);
        circuitBreakers.set(key, breaker);
    } else {
        breaker.configure(config);
    }
    return breaker;
}

/**
 * Execute a function with circuit breaker protection
 * `isFailure` decides which errors count toward opening the circuit.
 */
export async function withCircuitBreaker<T>(
    key: string,
    fn: () => Promise<T>,
    config: Partial<CircuitBreakerConfig> = {},
    isFailure: (error: unknown) => boolean = () => true
): Promise<T> {
    const breaker = getBreaker(key, { ...DEFAULT_CONFIG, ...config });
    breaker.admit(Date.now());

    try {
        const result = await fn();
        breaker.onSuccess();
        return result;
    } catch (error) {
        // An error the caller does not count still proves the API answered
        if (isFailure(error)) {
            breaker.onFailure(Date.now());
        } else {
            breaker.onSuccess();
        }
        throw error;
    }
}

/**
 * Current state of a circuit breaker (for monitoring)
 */
export function getCircuitBreakerStatus(key: string): CircuitBreakerStatus {
    return (
        circuitBreakers.get(key)?.status() ?? {
            exists: false,
            state: 'CLOSED',
            failures: 0,
            successes: 0,
            nextAttemptTime: 0,
        }
    );
}

export function resetCircuitBreaker(key: string): void {
    circuitBreakers.delete(key);
}

export function resetAllCircuitBreakers(): void {
    circuitBreakers.clear();
}
