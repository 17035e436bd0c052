/**
 * Refresh Scheduler
 * Owns the polling loop for one target: fixed-interval ticks, at most one
 * fetch in flight, and atomic snapshot publishing.
 *
 * States: idle -> fetching -> idle (snapshot replaced, or kept with an error
 * recorded); stop() moves to stopped from either state.
 */

import { z } from 'zod';
import { Logger, type ScopedLogger } from '@utils/logger';
import { DepartureError, toError } from './errors';
import type { DepartureSnapshot, DeparturesResponse, RawDeparture, RefreshState } from '@/types';
import { DepartureErrorCode } from '@/types';

export type RefreshEvent =
    | { type: 'updated'; snapshot: DepartureSnapshot }
    | { type: 'failed'; error: DepartureError; snapshot: DepartureSnapshot | null };

export type RefreshListener = (event: RefreshEvent) => void;

export interface RefreshSchedulerOptions {
    /** Used in log lines */
    name: string;
    intervalMs: number;
    fetch: () => Promise<DeparturesResponse>;
    /** Narrowing applied to every fetched list (normally the target's filter) */
    transform: (departures: readonly RawDeparture[]) => readonly RawDeparture[];
    /** Epoch ms clock for snapshot timestamps */
    now?: () => number;
}

/**
 * Map any failure from a fetch cycle onto FETCH_FAILED or PARSE_FAILED
 */
export function classifyFailure(error: unknown): DepartureError {
    if (error instanceof DepartureError) {
        return error;
    }
    if (error instanceof SyntaxError || error instanceof z.ZodError) {
        return new DepartureError(
            'Departure payload could not be parsed',
            DepartureErrorCode.PARSE_FAILED,
            error
        );
    }
    return new DepartureError(
        'Departure fetch failed',
        DepartureErrorCode.FETCH_FAILED,
        toError(error)
    );
}

export class RefreshScheduler {
    private readonly log: ScopedLogger;
    private readonly now: () => number;
    private readonly listeners = new Set<RefreshListener>();

    private currentState: RefreshState = 'idle';
    private timer: ReturnType<typeof setInterval> | undefined;
    private inFlight: Promise<void> | null = null;
    /** Bumped by stop() so an abandoned fetch cannot publish */
    private generation = 0;

    private currentSnapshot: DepartureSnapshot | null = null;
    private lastRaw: readonly RawDeparture[] | null = null;
    private currentError: DepartureError | null = null;

    constructor(private readonly options: RefreshSchedulerOptions) {
        if (!(options.intervalMs > 0)) {
            throw new RangeError(`Refresh interval must be positive, got ${options.intervalMs}`);
        }
        this.log = Logger.scoped(options.name);
        this.now = options.now ?? Date.now;
    }

    get state(): RefreshState {
        return this.currentState;
    }

    /** Latest published snapshot; kept unchanged when a refresh fails */
    get snapshot(): DepartureSnapshot | null {
        return this.currentSnapshot;
    }

    /** Failure of the most recent cycle, cleared by the next success */
    get lastError(): DepartureError | null {
        return this.currentError;
    }

    get lastUpdateSuccess(): boolean {
        return this.currentSnapshot !== null && this.currentError === null;
    }

    get running(): boolean {
        return this.timer !== undefined;
    }

    subscribe(listener: RefreshListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Run the first refresh, then start ticking
     * @throws DepartureError (SETUP_FAILED) when the first refresh fails; no
     *   timer is started in that case
     */
    async start(): Promise<void> {
        if (this.timer) {
            return;
        }
        if (this.currentState === 'stopped') {
            this.currentState = 'idle';
        }

        await this.refresh();

        const error = this.currentError;
        if (!this.currentSnapshot) {
            throw new DepartureError(
                `First refresh for ${this.options.name} failed`,
                DepartureErrorCode.SETUP_FAILED,
                error ?? undefined
            );
        }
        // A concurrent start() may have joined the same first refresh
        if (this.timer || this.isStopped()) {
            return;
        }

        this.timer = setInterval(() => {
            void this.refresh();
        }, this.options.intervalMs);
        this.log.info('Polling started', { intervalMs: this.options.intervalMs });
    }

    /**
     * Fetch now unless a fetch is already running
     * A call made while fetching joins the in-flight cycle instead of queuing
     * another one. Never rejects; failures land in lastError.
     */
    refresh(): Promise<void> {
        if (this.currentState === 'stopped') {
            return Promise.resolve();
        }
        if (this.inFlight) {
            this.log.debug('Refresh coalesced with in-flight fetch');
            return this.inFlight;
        }

        this.currentState = 'fetching';
        const cycle = this.runCycle(this.generation).finally(() => {
            // stop() detaches the cycle; a detached cycle must not touch state
            if (this.inFlight !== cycle) {
                return;
            }
            this.inFlight = null;
            this.currentState = 'idle';
        });
        this.inFlight = cycle;
        return cycle;
    }

    /**
     * Re-apply the transform to the last fetched list without fetching,
     * e.g. after the filter changed. Keeps the original fetch time and any
     * recorded failure, since nothing was fetched.
     */
    republish(): void {
        if (!this.lastRaw || !this.currentSnapshot) {
            return;
        }
        this.publish(this.lastRaw, this.currentSnapshot.fetchedAt, false);
    }

    /** Cancel pending ticks; a fetch still in flight is abandoned */
    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
        this.generation++;
        this.inFlight = null;
        this.currentState = 'stopped';
        this.log.info('Polling stopped');
    }

    private isStopped(): boolean {
        return this.currentState === 'stopped';
    }

    private async runCycle(generation: number): Promise<void> {
        let response: DeparturesResponse;
        try {
            response = await this.options.fetch();
        } catch (error) {
            if (generation !== this.generation) {
                return;
            }
            this.fail(classifyFailure(error));
            return;
        }

        if (generation !== this.generation) {
            this.log.debug('Discarding result of abandoned fetch');
            return;
        }

        try {
            this.publish(response.departures ?? [], this.now(), true);
        } catch (error) {
            this.fail(classifyFailure(error));
        }
    }

    private publish(raw: readonly RawDeparture[], fetchedAt: number, fetched: boolean): void {
        const departures = Object.freeze([...this.options.transform(raw)]);
        const snapshot: DepartureSnapshot = Object.freeze({ departures, fetchedAt });

        this.lastRaw = raw;
        this.currentSnapshot = snapshot;
        if (fetched) {
            this.currentError = null;
        }

        this.log.debug('Snapshot updated', { received: raw.length, kept: departures.length });
        this.emit({ type: 'updated', snapshot });
    }

    private fail(error: DepartureError): void {
        this.currentError = error;
        if (this.currentSnapshot) {
            this.log.warn('Refresh failed, keeping previous departures', {
                code: error.code,
                message: error.message,
            });
        } else {
            this.log.error('Refresh failed with no departures to fall back on', {
                code: error.code,
                message: error.message,
            });
        }
        this.emit({ type: 'failed', error, snapshot: this.currentSnapshot });
    }

    private emit(event: RefreshEvent): void {
        for (const listener of this.listeners) {
            try {
                listener(event);
            } catch (error) {
                this.log.error('Refresh listener threw', error);
            }
        }
    }
}
