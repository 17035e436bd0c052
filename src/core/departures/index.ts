/**
 * Departures Module
 * Filtering, view derivation and refresh scheduling for one polled stop
 */

export { createFilterSpec, filterDepartures, parseLineFilter } from './filter';
export {
    buildAttributes,
    countdownValue,
    deriveView,
    hasDelay,
    isCancelled,
    slotLabel,
    DEFAULT_VIEW_OPTIONS,
} from './view';
export { RefreshScheduler, classifyFailure } from './scheduler';
export type { RefreshEvent, RefreshListener, RefreshSchedulerOptions } from './scheduler';
export { DepartureTarget } from './target';
export type { DepartureTargetOptions } from './target';
export { buildSlotKey, buildTargetKey, buildTargetTitle } from './identity';
export { DepartureError, DiscoveryError } from './errors';
