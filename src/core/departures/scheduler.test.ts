import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { RefreshScheduler, classifyFailure, type RefreshEvent } from './scheduler';
import { DepartureError } from './errors';
import { DepartureErrorCode } from '@/types';
import type { DeparturesResponse, RawDeparture } from '@/types';

function deferred<T>() {
    const handle = { resolve: (_value: T): void => undefined };
    const promise = new Promise<T>(resolve => {
        handle.resolve = resolve;
    });
    return { promise, resolve: (value: T) => handle.resolve(value) };
}

function payload(...destinations: string[]): DeparturesResponse {
    return { departures: destinations.map(destination => ({ destination })) };
}

const destinations = (departures: readonly RawDeparture[] | undefined) =>
    (departures ?? []).map(d => d.destination);

describe('classifyFailure', () => {
    it('should pass departure errors through', () => {
        const error = new DepartureError('bad', DepartureErrorCode.PARSE_FAILED);
        expect(classifyFailure(error)).toBe(error);
    });

    it('should treat syntax and schema errors as parse failures', () => {
        expect(classifyFailure(new SyntaxError('Unexpected token')).code).toBe(
            DepartureErrorCode.PARSE_FAILED
        );
        const zodError = z.string().safeParse(1).error;
        expect(classifyFailure(zodError).code).toBe(DepartureErrorCode.PARSE_FAILED);
    });

    it('should treat anything else as a fetch failure', () => {
        const classified = classifyFailure('socket hang up');
        expect(classified.code).toBe(DepartureErrorCode.FETCH_FAILED);
        expect(classified.cause?.message).toBe('socket hang up');
    });
});

describe('RefreshScheduler', () => {
    let clock: number;

    const create = (
        fetch: () => Promise<DeparturesResponse>,
        transform: (d: readonly RawDeparture[]) => readonly RawDeparture[] = d => d
    ) =>
        new RefreshScheduler({
            name: 'test-target',
            intervalMs: 60_000,
            fetch,
            transform,
            now: () => clock,
        });

    beforeEach(() => {
        clock = 1_000;
        vi.useFakeTimers();
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    it('should reject a non-positive interval', () => {
        expect(
            () =>
                new RefreshScheduler({
                    name: 'x',
                    intervalMs: 0,
                    fetch: async () => payload(),
                    transform: d => d,
                })
        ).toThrow(RangeError);
    });

    describe('start', () => {
        it('should publish the first snapshot and begin ticking', async () => {
            const fetch = vi.fn(async () => payload('Bålsta', 'Uppsala'));
            const scheduler = create(fetch);

            await scheduler.start();

            expect(destinations(scheduler.snapshot?.departures)).toEqual(['Bålsta', 'Uppsala']);
            expect(scheduler.snapshot?.fetchedAt).toBe(1_000);
            expect(scheduler.state).toBe('idle');
            expect(scheduler.running).toBe(true);
            expect(scheduler.lastUpdateSuccess).toBe(true);

            clock = 61_000;
            await vi.advanceTimersByTimeAsync(60_000);

            expect(fetch).toHaveBeenCalledTimes(2);
            expect(scheduler.snapshot?.fetchedAt).toBe(61_000);

            scheduler.stop();
        });

        it('should fail setup when the first refresh fails', async () => {
            const scheduler = create(() => Promise.reject(new Error('offline')));

            const error = await scheduler.start().catch((e: unknown) => e);

            expect(error).toBeInstanceOf(DepartureError);
            if (error instanceof DepartureError) {
                expect(error.code).toBe(DepartureErrorCode.SETUP_FAILED);
                expect(error.cause).toBeInstanceOf(DepartureError);
                expect(error.cause?.message).toBe('Departure fetch failed');
            }
            expect(scheduler.running).toBe(false);
            expect(scheduler.snapshot).toBeNull();
        });

        it('should not tick after stop', async () => {
            const fetch = vi.fn(async () => payload('Bålsta'));
            const scheduler = create(fetch);

            await scheduler.start();
            scheduler.stop();
            await vi.advanceTimersByTimeAsync(180_000);

            expect(fetch).toHaveBeenCalledTimes(1);
            expect(scheduler.state).toBe('stopped');
            expect(scheduler.running).toBe(false);
        });
        it('should start one timer when start is called twice at once', async () => {
            const fetch = vi.fn(async () => payload('Bålsta'));
            const scheduler = create(fetch);

            await Promise.all([scheduler.start(), scheduler.start()]);

            expect(fetch).toHaveBeenCalledTimes(1);
            expect(vi.getTimerCount()).toBe(1);

            scheduler.stop();

            expect(vi.getTimerCount()).toBe(0);
            await vi.advanceTimersByTimeAsync(180_000);
            expect(fetch).toHaveBeenCalledTimes(1);
        });

        it('should not fetch on a tick while the previous fetch is still running', async () => {
            const pending = deferred<DeparturesResponse>();
            const fetch = vi
                .fn<() => Promise<DeparturesResponse>>()
                .mockResolvedValueOnce(payload('Bålsta'))
                .mockImplementation(() => pending.promise);
            const scheduler = create(fetch);

            await scheduler.start();
            await vi.advanceTimersByTimeAsync(60_000);

            expect(fetch).toHaveBeenCalledTimes(2);
            expect(scheduler.state).toBe('fetching');

            await vi.advanceTimersByTimeAsync(60_000);

            expect(fetch).toHaveBeenCalledTimes(2);

            const inFlight = scheduler.refresh();
            clock = 121_000;
            pending.resolve(payload('Uppsala'));
            await inFlight;

            expect(fetch).toHaveBeenCalledTimes(2);

            expect(scheduler.state).toBe('idle');
            expect(destinations(scheduler.snapshot?.departures)).toEqual(['Uppsala']);

            scheduler.stop();
        });
    });

    describe('refresh', () => {
        it('should keep the previous snapshot when a refresh fails', async () => {
            const fetch = vi
                .fn<() => Promise<DeparturesResponse>>()
                .mockResolvedValueOnce(payload('Bålsta'))
                .mockRejectedValueOnce(new Error('timeout'))
                .mockResolvedValueOnce(payload('Uppsala'));
            const scheduler = create(fetch);

            await scheduler.refresh();
            const first = scheduler.snapshot;

            await scheduler.refresh();

            expect(scheduler.snapshot).toBe(first);
            expect(scheduler.lastError?.code).toBe(DepartureErrorCode.FETCH_FAILED);
            expect(scheduler.lastUpdateSuccess).toBe(false);

            await scheduler.refresh();

            expect(destinations(scheduler.snapshot?.departures)).toEqual(['Uppsala']);
            expect(scheduler.lastError).toBeNull();
        });

        it('should record a parse failure for malformed payloads', async () => {
            const scheduler = create(() => Promise.reject(new SyntaxError('Unexpected end')));

            await scheduler.refresh();

            expect(scheduler.lastError?.code).toBe(DepartureErrorCode.PARSE_FAILED);
            expect(scheduler.snapshot).toBeNull();
        });

        it('should join an in-flight fetch instead of starting another', async () => {
            const pending = deferred<DeparturesResponse>();
            const fetch = vi.fn(() => pending.promise);
            const scheduler = create(fetch);

            const p1 = scheduler.refresh();
            const p2 = scheduler.refresh();

            expect(p2).toBe(p1);
            expect(fetch).toHaveBeenCalledTimes(1);
            expect(scheduler.state).toBe('fetching');

            pending.resolve(payload('Bålsta'));
            await p1;

            expect(scheduler.state).toBe('idle');
            expect(destinations(scheduler.snapshot?.departures)).toEqual(['Bålsta']);
        });

        it('should discard a fetch abandoned by stop', async () => {
            const pending = deferred<DeparturesResponse>();
            const fetch = vi.fn(() => pending.promise);
            const scheduler = create(fetch);

            const inFlight = scheduler.refresh();
            scheduler.stop();
            pending.resolve(payload('Bålsta'));
            await inFlight;

            expect(scheduler.snapshot).toBeNull();
            expect(scheduler.state).toBe('stopped');

            await scheduler.refresh();
            expect(fetch).toHaveBeenCalledTimes(1);
        });

        it('should freeze published snapshots', async () => {
            const scheduler = create(async () => payload('Bålsta'));

            await scheduler.refresh();

            expect(Object.isFrozen(scheduler.snapshot)).toBe(true);
            expect(Object.isFrozen(scheduler.snapshot?.departures)).toBe(true);
        });

        it('should apply the transform to every fetched list', async () => {
            const scheduler = create(
                async () => payload('Bålsta', 'Uppsala', 'Bålsta'),
                d => d.filter(x => x.destination === 'Bålsta')
            );

            await scheduler.refresh();

            expect(destinations(scheduler.snapshot?.departures)).toEqual(['Bålsta', 'Bålsta']);
        });
    });

    describe('republish', () => {
        it('should re-filter the last payload without fetching', async () => {
            let wanted = 'Bålsta';
            const fetch = vi.fn(async () => payload('Bålsta', 'Uppsala'));
            const scheduler = create(fetch, d => d.filter(x => x.destination === wanted));

            await scheduler.refresh();
            clock = 5_000;
            wanted = 'Uppsala';
            scheduler.republish();

            expect(fetch).toHaveBeenCalledTimes(1);
            expect(destinations(scheduler.snapshot?.departures)).toEqual(['Uppsala']);
            expect(scheduler.snapshot?.fetchedAt).toBe(1_000);
        });

        it('should keep a recorded failure when re-filtering', async () => {
            let wanted = 'Bålsta';
            const fetch = vi
                .fn<() => Promise<DeparturesResponse>>()
                .mockResolvedValueOnce(payload('Bålsta', 'Uppsala'))
                .mockRejectedValueOnce(new Error('timeout'));
            const scheduler = create(fetch, d => d.filter(x => x.destination === wanted));

            await scheduler.refresh();
            await scheduler.refresh();
            const error = scheduler.lastError;

            wanted = 'Uppsala';
            scheduler.republish();

            expect(destinations(scheduler.snapshot?.departures)).toEqual(['Uppsala']);
            expect(error?.code).toBe(DepartureErrorCode.FETCH_FAILED);
            expect(scheduler.lastError).toBe(error);
            expect(scheduler.lastUpdateSuccess).toBe(false);
        });

        it('should do nothing before the first snapshot', () => {
            const scheduler = create(async () => payload());

            scheduler.republish();

            expect(scheduler.snapshot).toBeNull();
        });
    });

    describe('subscribe', () => {
        it('should notify listeners of updates and failures', async () => {
            const fetch = vi
                .fn<() => Promise<DeparturesResponse>>()
                .mockResolvedValueOnce(payload('Bålsta'))
                .mockRejectedValueOnce(new Error('timeout'));
            const scheduler = create(fetch);
            const events: RefreshEvent['type'][] = [];
            scheduler.subscribe(event => events.push(event.type));

            await scheduler.refresh();
            await scheduler.refresh();

            expect(events).toEqual(['updated', 'failed']);
        });

        it('should keep notifying when a listener throws', async () => {
            const scheduler = create(async () => payload('Bålsta'));
            const received = vi.fn();
            scheduler.subscribe(() => {
                throw new Error('listener broke');
            });
            scheduler.subscribe(received);

            await scheduler.refresh();

            expect(received).toHaveBeenCalledTimes(1);
            expect(scheduler.lastError).toBeNull();
        });

        it('should stop notifying after unsubscribe', async () => {
            const scheduler = create(async () => payload('Bålsta'));
            const received = vi.fn();
            const unsubscribe = scheduler.subscribe(received);

            unsubscribe();
            await scheduler.refresh();

            expect(received).not.toHaveBeenCalled();
        });
    });
});
