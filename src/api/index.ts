/**
 * API Module
 * SL transport API client and configuration-time lookups
 */

export { fetchDepartures, fetchSites, slDepartureSource } from './transport';
export type { RequestOptions } from './transport';
export {
    DiscoveryService,
    projectLines,
    projectDirections,
    buildLineOptions,
    buildDirectionOptions,
    ALL_OPTION,
} from './discovery';
