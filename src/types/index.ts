/**
 * Centralized Type Definitions
 */

import { z } from 'zod';

// --- Transport Modes ---

export const TRANSPORT_MODES = ['TRAIN', 'METRO', 'BUS', 'TRAM', 'SHIP', 'FERRY'] as const;

export const TransportModeSchema = z.enum(TRANSPORT_MODES);
export type TransportMode = z.infer<typeof TransportModeSchema>;

export function isTransportMode(value: unknown): value is TransportMode {
    return TransportModeSchema.safeParse(value).success;
}

/** Human-readable names for mode pickers */
export const TRANSPORT_MODE_LABELS: Record<TransportMode, string> = {
    TRAIN: 'Train (Pendeltåg)',
    METRO: 'Metro (Tunnelbana)',
    BUS: 'Bus',
    TRAM: 'Tram (Spårvagn)',
    SHIP: 'Ship',
    FERRY: 'Ferry',
};

// --- Upstream (SL transport API) Types ---

/**
 * One departure record as returned by `/sites/{id}/departures`.
 * Every field is optional: payload variants omit different parts, and
 * consumers treat a missing field as non-matching rather than invalid.
 */
export const RawDepartureSchema = z
    .object({
        line: z
            .object({
                designation: z.string().nullish(),
                transport_mode: z.string().nullish(),
                group_of_lines: z.string().nullish(),
            })
            .passthrough()
            .nullish(),
        destination: z.string().nullish(),
        direction: z.string().nullish(),
        direction_code: z.union([z.string(), z.number()]).nullish(),
        scheduled: z.string().nullish(),
        expected: z.string().nullish(),
        display: z.string().nullish(),
        state: z.string().nullish(),
        journey: z
            .object({
                state: z.string().nullish(),
                prediction_state: z.string().nullish(),
            })
            .passthrough()
            .nullish(),
        stop_point: z.object({ designation: z.string().nullish() }).passthrough().nullish(),
        stop_area: z.object({ name: z.string().nullish() }).passthrough().nullish(),
        deviations: z
            .array(z.object({ message: z.string().nullish() }).passthrough())
            .nullish(),
    })
    .passthrough();
export type RawDeparture = z.infer<typeof RawDepartureSchema>;

export const DeparturesResponseSchema = z
    .object({
        departures: z.array(RawDepartureSchema).nullish(),
    })
    .passthrough();
export type DeparturesResponse = z.infer<typeof DeparturesResponseSchema>;

export const SiteSchema = z
    .object({
        id: z.union([z.string(), z.number()]),
        name: z.string().nullish(),
    })
    .passthrough();

export const SitesResponseSchema = z.array(SiteSchema);

/**
 * Supplies the raw departures payload for a site, or fails
 * Implementations throw DepartureError (FETCH_FAILED / PARSE_FAILED).
 */
export interface DepartureSource {
    fetchDepartures(siteId: string): Promise<DeparturesResponse>;
}

/** Stop (site) as exposed to configuration UIs */
export interface Site {
    id: string;
    name: string;
}

// --- Filtering ---

/** Narrowing applied to every fetched departure list */
export interface FilterSpec {
    /** Accepted transport modes (never empty) */
    readonly modes: ReadonlySet<TransportMode>;
    /** Exact direction code, empty string accepts all */
    readonly directionCode: string;
    /** Accepted line designations, empty list accepts all */
    readonly lines: readonly string[];
}

/** Loose input accepted by createFilterSpec */
export interface FilterSpecInput {
    modes?: Iterable<TransportMode>;
    directionCode?: string | number | null;
    /** Either a list or comma-separated text, e.g. " 19, 19S " */
    lines?: string | readonly string[] | null;
}

// --- Snapshots ---

/** Most recent successfully fetched and filtered departure list */
export interface DepartureSnapshot {
    readonly departures: readonly RawDeparture[];
    /** Epoch ms of the fetch that produced this snapshot */
    readonly fetchedAt: number;
}

// --- Presentation ---

/** Derived attributes shared by every view policy */
export interface DepartureAttributes {
    line: string | null;
    destination: string | null;
    scheduledTime: string | null;
    expectedTime: string | null;
    timeFormatted: string | null;
    minutesUntil: number;
    transportMode: string | null;
    realTime: boolean;
    delayMinutes: number;
    canceled: boolean;
    platform: string | null;
    agency: string;
    direction: string | null;
    state: string | null;
    stopArea: string | null;
    deviations?: string[];
}

export type ViewPolicy =
    | { kind: 'slots'; count: number }
    | { kind: 'next' }
    | { kind: 'nextActive' };

export interface SlotState {
    index: number;
    label: string;
    value: string | null;
    attributes: DepartureAttributes | null;
    available: boolean;
}

export interface UpcomingAttributes {
    upcoming: DepartureAttributes[];
}

export type ViewState =
    | { kind: 'slots'; slots: SlotState[] }
    | {
          kind: 'next' | 'nextActive';
          value: string | null;
          attributes: UpcomingAttributes;
          available: boolean;
      };

/** Options that shape derived values without changing which record is shown */
export interface ViewOptions {
    /** IANA zone for clock strings, host zone when omitted */
    timeZone?: string;
    /** Value shown by the next-active view when a departure is due */
    nowLabel: string;
    agency: string;
}

// --- Refresh ---

export type RefreshState = 'idle' | 'fetching' | 'stopped';

/** Departure error codes */
export const DepartureErrorCode = {
    FETCH_FAILED: 1,
    PARSE_FAILED: 2,
    SETUP_FAILED: 3,
    INVALID_FILTER: 4,
} as const;
export type DepartureErrorCodeType = (typeof DepartureErrorCode)[keyof typeof DepartureErrorCode];

/** Reasons surfaced to whatever drives site/line/direction selection */
export type DiscoveryErrorReason = 'cannot_connect' | 'search_too_short' | 'no_matches';

// --- Discovery ---

export interface LineOption {
    designation: string;
    groupOfLines: string;
}

export interface DirectionOption {
    directionCode: string;
    destination: string;
}

export interface SiteOption {
    value: string;
    label: string;
}
