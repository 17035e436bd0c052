/**
 * Time Utilities
 * Timestamp parsing, delay and countdown math, clock formatting.
 * Every function here is total: malformed input degrades to null or 0.
 */

import { Logger } from './logger';

/** Parsed ISO-8601 timestamp */
export interface ParsedTimestamp {
    /** Absolute instant; naive values are read as local wall-clock time */
    instant: Date;
    /** True when the source carried `Z` or a numeric offset */
    zoned: boolean;
    /** Wall-clock fields exactly as written in the source */
    hours: number;
    minutes: number;
}

const ISO_PATTERN =
    /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

function parseOffsetMinutes(designator: string): number {
    if (designator.toUpperCase() === 'Z') {
        return 0;
    }
    const sign = designator.startsWith('-') ? -1 : 1;
    const digits = designator.slice(1).replace(':', '');
    const hours = parseInt(digits.slice(0, 2), 10);
    const minutes = digits.length > 2 ? parseInt(digits.slice(2, 4), 10) : 0;
    return sign * (hours * 60 + minutes);
}

/**
 * Parse an ISO-8601 date-time string
 * @returns null for missing, malformed or out-of-range input
 */
export function parseTimestamp(value: string | null | undefined): ParsedTimestamp | null {
    if (!value) {
        return null;
    }

    const match = value.trim().match(ISO_PATTERN);
    if (!match) {
        return null;
    }

    const [, yearStr, monthStr, dayStr, hourStr, minuteStr, secondStr, fractionStr, zone] = match;
    const year = parseInt(yearStr, 10);
    const month = parseInt(monthStr, 10);
    const day = parseInt(dayStr, 10);
    const hours = parseInt(hourStr, 10);
    const minutes = parseInt(minuteStr, 10);
    const seconds = secondStr ? parseInt(secondStr, 10) : 0;
    const millis = fractionStr ? parseInt(fractionStr.padEnd(3, '0').slice(0, 3), 10) : 0;

    if (month < 1 || month > 12 || hours > 23 || minutes > 59 || seconds > 59) {
        return null;
    }

    // Day overflow (e.g. 02-30) shows up as a different calendar date after construction
    const calendar = new Date(Date.UTC(year, month - 1, day));
    if (calendar.getUTCMonth() !== month - 1 || calendar.getUTCDate() !== day) {
        return null;
    }

    if (zone) {
        const offset = parseOffsetMinutes(zone);
        if (Math.abs(offset) > 18 * 60) {
            return null;
        }
        const epoch =
            Date.UTC(year, month - 1, day, hours, minutes, seconds, millis) - offset * 60000;
        return { instant: new Date(epoch), zoned: true, hours, minutes };
    }

    const local = new Date(year, month - 1, day, hours, minutes, seconds, millis);
    return { instant: local, zoned: false, hours, minutes };
}

/**
 * Delay between scheduled and expected departure, truncated toward zero
 * @returns Negative for early departures, null if either side is missing,
 *   unparsable, or the two are not in the same frame (naive vs zoned)
 */
export function delayMinutes(
    scheduled: string | null | undefined,
    expected: string | null | undefined
): number | null {
    const scheduledTs = parseTimestamp(scheduled);
    const expectedTs = parseTimestamp(expected);
    if (!scheduledTs || !expectedTs || scheduledTs.zoned !== expectedTs.zoned) {
        return null;
    }

    const diffSeconds = (expectedTs.instant.getTime() - scheduledTs.instant.getTime()) / 1000;
    const minutes = Math.trunc(diffSeconds / 60);
    // Math.trunc keeps the sign of zero
    return minutes === 0 ? 0 : minutes;
}

/**
 * Whole minutes until the expected time, never negative
 * Naive timestamps are read on the local clock, zoned ones as UTC instants,
 * so both compare against the same `now` epoch without mixing frames.
 */
export function minutesUntil(expected: string | null | undefined, now: Date = new Date()): number {
    const expectedTs = parseTimestamp(expected);
    if (!expectedTs) {
        return 0;
    }

    const diffMs = expectedTs.instant.getTime() - now.getTime();
    return Math.max(0, Math.floor(diffMs / 60000));
}

function pad(value: number): string {
    return value.toString().padStart(2, '0');
}

function formatInZone(instant: Date, timeZone: string | undefined): string {
    try {
        const parts = new Intl.DateTimeFormat('en-GB', {
            hour: '2-digit',
            minute: '2-digit',
            hourCycle: 'h23',
            timeZone,
        }).formatToParts(instant);
        const hour = parts.find(part => part.type === 'hour')?.value ?? '00';
        const minute = parts.find(part => part.type === 'minute')?.value ?? '00';
        return `${hour}:${minute}`;
    } catch (error) {
        Logger.warn('Unknown display time zone, using host zone', { timeZone, error });
        return formatTimeHHMM(instant);
    }
}

/**
 * Format a timestamp as "HH:MM" for display
 * Zoned timestamps are converted to the display zone first; naive ones are
 * already wall-clock values and are formatted as written.
 */
export function formatClock(
    timestamp: string | null | undefined,
    timeZone?: string
): string | null {
    const parsed = parseTimestamp(timestamp);
    if (!parsed) {
        return null;
    }

    if (!parsed.zoned) {
        return `${pad(parsed.hours)}:${pad(parsed.minutes)}`;
    }

    return formatInZone(parsed.instant, timeZone);
}

/**
 * Format Date as HH:MM string in the host zone
 */
export function formatTimeHHMM(date: Date): string {
    return `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}
