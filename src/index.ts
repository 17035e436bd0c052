/**
 * SL departures engine
 * Polls one stop per target and derives display-ready departure views.
 */

export * from '@/core';
export * from '@/api';
export {
    loadConfig,
    getConfig,
    setConfig,
    resetConfig,
    isConfigLoaded,
    ConfigSchema,
    ConfigValidationError,
} from '@/config';
export type { AppConfig, TargetConfig } from '@/config';
export { delayMinutes, minutesUntil, formatClock, parseTimestamp } from '@utils/time';
export { Logger } from '@utils/logger';
export { startEngine, startTargets, createTarget } from './main';
export type { DepartureEngine } from './main';
export * from '@/types';
