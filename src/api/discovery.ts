/**
 * Site, Line and Direction Discovery
 * Lookups used while a target is being configured, never while polling.
 *
 * Failures surface as DiscoveryError so a settings form can show a message
 * and let the user try again; nothing here retries on its own.
 */

import { Logger } from '@utils/logger';
import { DiscoveryError, toError } from '@core/departures/errors';
import { fetchDepartures, fetchSites } from './transport';
import type {
    DirectionOption,
    LineOption,
    RawDeparture,
    Site,
    SiteOption,
    TransportMode,
} from '@/types';

export const ALL_OPTION = '__all__';

const MIN_SEARCH_LENGTH = 2;

let cachedSites: Site[] | null = null;

const byText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

async function loadDepartures(siteId: string): Promise<readonly RawDeparture[]> {
    try {
        const response = await fetchDepartures(siteId, { retry: false });
        return response.departures ?? [];
    } catch (error) {
        throw new DiscoveryError(
            `Could not load departures for site ${siteId}`,
            'cannot_connect',
            toError(error)
        );
    }
}

/**
 * Unique lines of one transport mode seen at a site, first occurrence wins
 */
export function projectLines(
    departures: readonly RawDeparture[],
    mode: TransportMode
): LineOption[] {
    const lines = new Map<string, string>();

    for (const departure of departures) {
        const info = departure.line;
        if (!info || info.transport_mode !== mode) continue;

        const designation = info.designation ?? '';
        if (designation && !lines.has(designation)) {
            lines.set(designation, info.group_of_lines ?? '');
        }
    }

    return Array.from(lines, ([designation, groupOfLines]) => ({ designation, groupOfLines })).sort(
        (a, b) => byText(a.designation, b.designation)
    );
}

/**
 * Unique direction codes seen at a site, first destination wins
 */
export function projectDirections(
    departures: readonly RawDeparture[],
    mode: TransportMode,
    line = ''
): DirectionOption[] {
    const directions = new Map<string, string>();

    for (const departure of departures) {
        const info = departure.line;
        if (!info || info.transport_mode !== mode) continue;
        if (line && info.designation !== line) continue;

        const code = departure.direction_code;
        const directionCode = code === null || code === undefined ? '' : String(code);
        const destination = departure.destination ?? '';

        if (directionCode && destination && !directions.has(directionCode)) {
            directions.set(directionCode, destination);
        }
    }

    return Array.from(directions, ([directionCode, destination]) => ({
        directionCode,
        destination,
    })).sort((a, b) => byText(a.directionCode, b.directionCode));
}

/**
 * Discovery Service - lookups behind the stop/line/direction pickers
 */
export const DiscoveryService = {
    /**
     * Sites whose name contains the search term (case-insensitive)
     * Duplicate names are labelled with their id so they can be told apart.
     */
    async searchSites(term: string): Promise<SiteOption[]> {
        const search = term.trim().toLowerCase();
        if (search.length < MIN_SEARCH_LENGTH) {
            throw new DiscoveryError('Search term is too short', 'search_too_short');
        }

        if (!cachedSites) {
            try {
                cachedSites = await fetchSites({ retry: false });
            } catch (error) {
                throw new DiscoveryError('Could not load sites', 'cannot_connect', toError(error));
            }
        }

        const matches = cachedSites
            .filter(site => site.name.toLowerCase().includes(search))
            .sort((a, b) => byText(a.name, b.name));

        if (matches.length === 0) {
            throw new DiscoveryError(`No sites match "${term.trim()}"`, 'no_matches');
        }

        const nameCounts = new Map<string, number>();
        for (const site of matches) {
            nameCounts.set(site.name, (nameCounts.get(site.name) ?? 0) + 1);
        }

        Logger.debug('Site search', { term: search, matches: matches.length });

        return matches.map(site => ({
            value: site.id,
            label: (nameCounts.get(site.name) ?? 0) > 1 ? `${site.name} (${site.id})` : site.name,
        }));
    },

    async discoverLines(siteId: string, mode: TransportMode): Promise<LineOption[]> {
        return projectLines(await loadDepartures(siteId), mode);
    },

    async discoverDirections(
        siteId: string,
        mode: TransportMode,
        line = ''
    ): Promise<DirectionOption[]> {
        return projectDirections(await loadDepartures(siteId), mode, line);
    },

    /** Forget the cached site list */
    clearCache(): void {
        cachedSites = null;
    },
};

/**
 * Picker options for lines, led by an "All lines" entry
 */
export function buildLineOptions(lines: readonly LineOption[]): SiteOption[] {
    return [
        { value: ALL_OPTION, label: 'All lines' },
        ...lines.map(({ designation, groupOfLines }) => ({
            value: designation,
            label:
                groupOfLines && groupOfLines !== designation
                    ? `${designation} (${groupOfLines})`
                    : designation,
        })),
    ];
}

/**
 * Picker options for directions, led by an "All directions" entry
 * Without discovered directions the two generic upstream codes are offered.
 */
export function buildDirectionOptions(directions: readonly DirectionOption[]): SiteOption[] {
    const options: SiteOption[] = [{ value: ALL_OPTION, label: 'All directions' }];

    if (directions.length === 0) {
        options.push({ value: '1', label: 'Direction 1' }, { value: '2', label: 'Direction 2' });
        return options;
    }

    for (const { directionCode, destination } of directions) {
        options.push({ value: directionCode, label: `→ ${destination}` });
    }
    return options;
}
