/**
 * Departure Target
 * One polled stop + filter combination and the views consumers read from it.
 */

import { createFilterSpec, filterDepartures } from './filter';
import { RefreshScheduler, type RefreshListener } from './scheduler';
import { DEFAULT_VIEW_OPTIONS, deriveView } from './view';
import { buildSlotKey, buildTargetKey, buildTargetTitle } from './identity';
import type { DepartureError } from './errors';
import type {
    DepartureSnapshot,
    DepartureSource,
    FilterSpec,
    FilterSpecInput,
    RefreshState,
    ViewOptions,
    ViewPolicy,
    ViewState,
} from '@/types';

export interface DepartureTargetOptions {
    siteId: string;
    siteName?: string;
    filter: FilterSpecInput;
    /** Direction label used in the title */
    directionName?: string;
    /** Number of slots in the slot view */
    numDepartures: number;
    intervalMs: number;
    source: DepartureSource;
    view?: Partial<ViewOptions>;
    /** Wall clock for derived countdowns */
    clock?: () => Date;
}

export class DepartureTarget {
    readonly key: string;
    readonly title: string;
    readonly siteId: string;
    readonly numDepartures: number;

    private filterSpec: FilterSpec;
    private readonly viewOptions: ViewOptions;
    private readonly clock: () => Date;
    private readonly scheduler: RefreshScheduler;

    constructor(options: DepartureTargetOptions) {
        this.siteId = options.siteId;
        this.numDepartures = options.numDepartures;
        this.filterSpec = createFilterSpec(options.filter);
        this.viewOptions = { ...DEFAULT_VIEW_OPTIONS, ...options.view };
        this.clock = options.clock ?? (() => new Date());

        const identity = {
            siteId: options.siteId,
            siteName: options.siteName,
            transportModes: [...this.filterSpec.modes],
            line: this.filterSpec.lines.join(','),
            directionCode: this.filterSpec.directionCode,
            directionName: options.directionName,
        };
        this.key = buildTargetKey(identity);
        this.title = buildTargetTitle(identity);

        const source = options.source;
        this.scheduler = new RefreshScheduler({
            name: this.key,
            intervalMs: options.intervalMs,
            fetch: () => source.fetchDepartures(this.siteId),
            transform: departures => filterDepartures(departures, this.filterSpec),
            now: () => this.clock().getTime(),
        });
    }

    get filter(): FilterSpec {
        return this.filterSpec;
    }

    get snapshot(): DepartureSnapshot | null {
        return this.scheduler.snapshot;
    }

    get lastError(): DepartureError | null {
        return this.scheduler.lastError;
    }

    get state(): RefreshState {
        return this.scheduler.state;
    }

    /**
     * True once any snapshot exists
     * A failed refresh keeps the previous snapshot, so it does not flip this.
     */
    get available(): boolean {
        return this.scheduler.snapshot !== null;
    }

    /** Resolves after the first refresh; rejects with SETUP_FAILED if it fails */
    start(): Promise<void> {
        return this.scheduler.start();
    }

    stop(): void {
        this.scheduler.stop();
    }

    refresh(): Promise<void> {
        return this.scheduler.refresh();
    }

    subscribe(listener: RefreshListener): () => void {
        return this.scheduler.subscribe(listener);
    }

    /**
     * Swap the filter and re-filter the last fetched payload
     * The filter is replaced whole, never edited while a fetch runs.
     */
    reconfigure(filter: FilterSpecInput): void {
        this.filterSpec = createFilterSpec(filter);
        this.scheduler.republish();
    }

    view(policy: ViewPolicy): ViewState {
        const departures = this.scheduler.snapshot?.departures ?? [];
        return deriveView(policy, departures, this.clock(), this.viewOptions);
    }

    slots(): ViewState {
        return this.view({ kind: 'slots', count: this.numDepartures });
    }

    next(): ViewState {
        return this.view({ kind: 'next' });
    }

    nextActive(): ViewState {
        return this.view({ kind: 'nextActive' });
    }

    slotKey(index: number): string {
        return buildSlotKey(this.key, index);
    }
}
