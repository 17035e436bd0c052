/**
 * Request Throttling and Deduplication
 * Caps concurrent outbound requests and shares one promise between
 * identical requests that are in flight at the same time.
 */

import { Logger } from './logger';

export interface ThrottleConfig {
    maxConcurrent: number;
    enableDeduplication: boolean;
}

const DEFAULT_THROTTLE_CONFIG: ThrottleConfig = {
    maxConcurrent: 4,
    enableDeduplication: true,
};

type Task = () => void;

let currentConfig: ThrottleConfig = { ...DEFAULT_THROTTLE_CONFIG };
let activeCount = 0;
let waiting: Task[] = [];
const inFlight = new Map<string, Promise<unknown>>();

export function configureThrottle(config: Partial<ThrottleConfig>): void {
    currentConfig = { ...currentConfig, ...config };
}

function release(): void {
    activeCount--;
    const next = waiting.shift();
    if (next) {
        next();
    }
}

function acquire(): Promise<void> {
    if (activeCount < currentConfig.maxConcurrent) {
        activeCount++;
        return Promise.resolve();
    }
    Logger.debug(`Throttle: queueing request (queue size: ${waiting.length + 1})`);
    return new Promise(resolve => {
        waiting.push(() => {
            activeCount++;
            resolve();
        });
    });
}

async function run<T>(fn: () => Promise<T>): Promise<T> {
    await acquire();
    try {
        return await fn();
    } finally {
        release();
    }
}

/**
 * Execute a request with throttling and optional deduplication
 */
export function throttledRequest<T>(key: string, fn: () => Promise<T>): Promise<T> {
    if (!currentConfig.enableDeduplication) {
        return run(fn);
    }

    const existing = inFlight.get(key);
    if (existing) {
        Logger.debug(`Throttle: deduplicating request for ${key}`);
        return existing as Promise<T>;
    }

    const promise = run(fn).finally(() => {
        inFlight.delete(key);
    });
    inFlight.set(key, promise);
    return promise;
}

export function getThrottleStatus(): {
    activeCount: number;
    queueLength: number;
    inFlightKeys: string[];
} {
    return {
        activeCount,
        queueLength: waiting.length,
        inFlightKeys: Array.from(inFlight.keys()),
    };
}

/**
 * Reset throttle state (for testing)
 */
export function resetThrottle(): void {
    activeCount = 0;
    waiting = [];
    inFlight.clear();
    currentConfig = { ...DEFAULT_THROTTLE_CONFIG };
}
