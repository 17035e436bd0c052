/**
 * Departure Filter
 * Narrows a raw departure list by transport mode, direction and line.
 */

import { DepartureError } from './errors';
import type { FilterSpec, FilterSpecInput, RawDeparture, TransportMode } from '@/types';
import { DepartureErrorCode, isTransportMode } from '@/types';

const DEFAULT_MODES: readonly TransportMode[] = ['TRAIN'];

/**
 * Split a line filter into trimmed designations
 * " 19, 19S " becomes ["19", "19S"]; blank entries are dropped.
 */
export function parseLineFilter(input: string | readonly string[] | null | undefined): string[] {
    if (!input) {
        return [];
    }
    const entries = typeof input === 'string' ? input.split(',') : input;
    return entries.map(entry => entry.trim()).filter(entry => entry.length > 0);
}

/**
 * Build an immutable filter spec from configuration input
 * @throws DepartureError (INVALID_FILTER) when an explicit mode list is empty
 */
export function createFilterSpec(input: FilterSpecInput = {}): FilterSpec {
    const modes = new Set<TransportMode>(input.modes ?? DEFAULT_MODES);
    if (modes.size === 0) {
        throw new DepartureError(
            'Filter needs at least one transport mode',
            DepartureErrorCode.INVALID_FILTER
        );
    }

    const directionCode =
        input.directionCode === null || input.directionCode === undefined
            ? ''
            : String(input.directionCode).trim();

    return Object.freeze({
        modes,
        directionCode,
        lines: Object.freeze(parseLineFilter(input.lines)),
    });
}

function matchesMode(departure: RawDeparture, modes: ReadonlySet<TransportMode>): boolean {
    const mode = departure.line?.transport_mode;
    return isTransportMode(mode) && modes.has(mode);
}

function matchesDirection(departure: RawDeparture, directionCode: string): boolean {
    const code = departure.direction_code;
    return code !== null && code !== undefined && String(code) === directionCode;
}

function matchesLine(departure: RawDeparture, lines: readonly string[]): boolean {
    const designation = departure.line?.designation;
    return typeof designation === 'string' && lines.includes(designation);
}

/**
 * Apply a filter spec: mode, then direction, then line
 * Order-preserving and non-mutating; records missing a compared field never match.
 */
export function filterDepartures(
    departures: readonly RawDeparture[],
    spec: FilterSpec
): RawDeparture[] {
    let filtered = departures.filter(departure => matchesMode(departure, spec.modes));

    if (spec.directionCode) {
        filtered = filtered.filter(departure => matchesDirection(departure, spec.directionCode));
    }

    if (spec.lines.length > 0) {
        filtered = filtered.filter(departure => matchesLine(departure, spec.lines));
    }

    return filtered;
}
