/**
 * Target Identity
 * Stable composite keys and display titles for a configured target.
 */

import type { TransportMode } from '@/types';

export interface TargetIdentityInput {
    siteId: string;
    siteName?: string;
    transportModes?: readonly TransportMode[];
    line?: string;
    directionCode?: string;
    directionName?: string;
}

/**
 * Unique key, e.g. "sl_departures_9001_TRAIN_line43_dir1"
 * Two targets with the same key would poll and filter identically.
 */
export function buildTargetKey(input: TargetIdentityInput): string {
    let key = `sl_departures_${input.siteId}`;
    if (input.transportModes && input.transportModes.length > 0) {
        key += `_${[...input.transportModes].sort().join('-')}`;
    }
    if (input.line) {
        key += `_line${input.line.replace(/\s+/g, '')}`;
    }
    if (input.directionCode) {
        key += `_dir${input.directionCode}`;
    }
    return key;
}

/** Key of one presentation slot within a target */
export function buildSlotKey(targetKey: string, index: number): string {
    return `${targetKey}_dep${index}`;
}

/**
 * Title such as "Odenplan Line 43 → Bålsta"
 */
export function buildTargetTitle(input: TargetIdentityInput): string {
    let title = input.siteName || `Site ${input.siteId}`;
    if (input.line) {
        title += ` Line ${input.line}`;
    }
    if (input.directionCode && input.directionName) {
        title += ` → ${input.directionName}`;
    } else if (input.directionCode) {
        title += ` Dir ${input.directionCode}`;
    }
    return title;
}
