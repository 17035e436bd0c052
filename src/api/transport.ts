/**
 * SL Transport API Client
 * Fetches sites and real-time departures from the public SL transport API
 *
 * The API is open; no key or session is needed.
 */

import { Logger } from '@utils/logger';
import { resilientFetch, CircuitOpenError } from '@utils/resilient-fetch';
import { getConfig } from '@config/index';
import { DepartureError, toError } from '@core/departures/errors';
import type { DepartureSource, DeparturesResponse, Site } from '@/types';
import { DepartureErrorCode, DeparturesResponseSchema, SitesResponseSchema } from '@/types';

export interface RequestOptions {
    /** Retry transient failures and count them against the circuit (default true) */
    retry?: boolean;
}

async function getJson(url: string, timeout: number): Promise<unknown> {
    let res: Response;
    try {
        res = await fetch(url, {
            headers: { Accept: 'application/json' },
            signal: AbortSignal.timeout(timeout),
        });
    } catch (error) {
        throw new DepartureError(
            `Request to ${url} failed`,
            DepartureErrorCode.FETCH_FAILED,
            toError(error)
        );
    }

    if (!res.ok) {
        throw new DepartureError(
            `SL API error: ${res.status} for ${url}`,
            DepartureErrorCode.FETCH_FAILED
        );
    }

    try {
        const body: unknown = await res.json();
        return body;
    } catch (error) {
        throw new DepartureError(
            `SL API returned malformed JSON for ${url}`,
            DepartureErrorCode.PARSE_FAILED,
            toError(error)
        );
    }
}

/**
 * GET a JSON document through the resilience stack
 * Only transport failures are retried or counted against the circuit; a
 * malformed body will not improve. Each request key has its own circuit, so
 * one failing site does not block the others.
 */
async function requestJson(
    apiKey: string,
    requestKey: string,
    url: string,
    options: RequestOptions
): Promise<unknown> {
    const { timeout, retryAttempts, retryDelay } = getConfig().api;
    const retry = options.retry ?? true;
    const isFetchFailure = (error: unknown): boolean =>
        !(error instanceof DepartureError) || error.isFetchFailure();
    // One-shot lookups must not join a retrying request for the same resource
    const key = retry ? requestKey : `${requestKey}:once`;

    try {
        return await resilientFetch(apiKey, key, () => getJson(url, timeout), {
            skipCircuitBreaker: !retry,
            isCircuitFailure: isFetchFailure,
            retry: {
                maxAttempts: retry ? retryAttempts : 1,
                initialDelay: retryDelay,
                shouldRetry: isFetchFailure,
            },
        });
    } catch (error) {
        if (error instanceof DepartureError) {
            throw error;
        }
        if (error instanceof CircuitOpenError) {
            Logger.warn('SL API circuit open, skipping request', {
                requestKey,
                retryAfter: error.retryAfter,
            });
        }
        throw new DepartureError(
            `Request to ${url} failed`,
            DepartureErrorCode.FETCH_FAILED,
            toError(error)
        );
    }
}

/**
 * Fetch the raw departures payload for a site
 * A payload without a `departures` key is an empty list, not an error.
 */
export async function fetchDepartures(
    siteId: string,
    options: RequestOptions = {}
): Promise<DeparturesResponse> {
    const { baseUrl } = getConfig().api;
    const url = `${baseUrl}/sites/${encodeURIComponent(siteId)}/departures`;

    Logger.debug('Fetching departures', { siteId });

    const body = await requestJson('sl-departures', siteId, url, options);
    const result = DeparturesResponseSchema.safeParse(body);

    if (!result.success) {
        Logger.warn('Invalid departures response', { siteId, issues: result.error.issues });
        throw new DepartureError(
            `Unexpected departures payload for site ${siteId}`,
            DepartureErrorCode.PARSE_FAILED,
            result.error
        );
    }

    const departures = result.data.departures ?? [];
    Logger.debug('Fetched departures', { siteId, count: departures.length });

    return { ...result.data, departures };
}

/**
 * Fetch every SL site (stop) as id/name pairs
 */
export async function fetchSites(options: RequestOptions = {}): Promise<Site[]> {
    const { baseUrl } = getConfig().api;
    const body = await requestJson('sl-sites', 'all', `${baseUrl}/sites`, options);
    const result = SitesResponseSchema.safeParse(body);

    if (!result.success) {
        throw new DepartureError(
            'Unexpected sites payload',
            DepartureErrorCode.PARSE_FAILED,
            result.error
        );
    }

    const sites = result.data.map(site => {
        const id = String(site.id);
        return { id, name: site.name ?? `Site ${id}` };
    });

    Logger.info('Fetched sites', { count: sites.length });
    return sites;
}

/** Departure source backed by the live SL API */
export const slDepartureSource: DepartureSource = {
    fetchDepartures: siteId => fetchDepartures(siteId),
};
