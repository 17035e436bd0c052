/**
 * Departure Error Types
 */

import type { DepartureErrorCodeType, DiscoveryErrorReason } from '@/types';
import { DepartureErrorCode } from '@/types';

/**
 * Custom error for departure refresh and setup failures
 * Carries a code so consumers can decide whether stale data is still usable
 */
export class DepartureError extends Error {
    constructor(
        message: string,
        public readonly code: DepartureErrorCodeType,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'DepartureError';
    }

    /** Network, timeout, open circuit or non-2xx response */
    isFetchFailure(): boolean {
        return this.code === DepartureErrorCode.FETCH_FAILED;
    }

    /** Malformed JSON or unexpected payload shape */
    isParseFailure(): boolean {
        return this.code === DepartureErrorCode.PARSE_FAILED;
    }

    /** First refresh failed, so the target has nothing to serve */
    isSetupFailure(): boolean {
        return this.code === DepartureErrorCode.SETUP_FAILED;
    }

    /** Get user-friendly error message */
    getUserMessage(): string {
        switch (this.code) {
            case DepartureErrorCode.FETCH_FAILED:
                return 'Could not reach the departure service. Showing the last known departures.';
            case DepartureErrorCode.PARSE_FAILED:
                return 'The departure service returned unexpected data.';
            case DepartureErrorCode.SETUP_FAILED:
                return 'Could not load departures for this stop. Please try again later.';
            case DepartureErrorCode.INVALID_FILTER:
                return 'At least one transport mode must be selected.';
            default:
                return 'An error occurred loading departures.';
        }
    }
}

/**
 * Error raised while looking up sites, lines or directions for configuration
 * The reason is a stable key a settings form can map to a field message.
 */
export class DiscoveryError extends Error {
    constructor(
        message: string,
        public readonly reason: DiscoveryErrorReason,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'DiscoveryError';
    }
}

/** Wrap an unknown thrown value into an Error */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
