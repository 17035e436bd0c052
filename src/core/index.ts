/**
 * Core Module
 * Departure aggregation and presentation logic
 */

export * from './departures';
