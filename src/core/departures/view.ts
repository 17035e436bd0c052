/**
 * Departure View
 * Derives presentation state from a filtered departure list.
 *
 * All three policies share buildAttributes so the attribute shape and the
 * delay/countdown math stay identical whichever view a consumer reads.
 */

import { delayMinutes, formatClock, minutesUntil, parseTimestamp } from '@utils/time';
import type {
    DepartureAttributes,
    RawDeparture,
    SlotState,
    ViewOptions,
    ViewPolicy,
    ViewState,
} from '@/types';

export const CANCELLED_STATE = 'CANCELLED';
export const REALTIME_PREDICTION_STATE = 'NORMAL';

export const DEFAULT_VIEW_OPTIONS: ViewOptions = {
    nowLabel: 'Nu',
    agency: 'SL',
};

/**
 * Canonical cancellation test
 * Reads the nested journey state; the top-level `state` is reported as an
 * attribute but does not decide cancellation.
 */
export function isCancelled(departure: RawDeparture): boolean {
    return departure.journey?.state === CANCELLED_STATE;
}

/** True when the departure runs later than scheduled */
export function hasDelay(departure: RawDeparture): boolean {
    const delay = delayMinutes(departure.scheduled, departure.expected);
    return delay !== null && delay > 0;
}

/** Human-readable slot position: Next, 2nd, 3rd, 4th... */
export function slotLabel(index: number): string {
    switch (index) {
        case 0:
            return 'Next';
        case 1:
            return '2nd';
        case 2:
            return '3rd';
        default:
            return `${index + 1}th`;
    }
}

function deviationMessages(departure: RawDeparture): string[] {
    return (departure.deviations ?? [])
        .map(deviation => deviation.message)
        .filter((message): message is string => typeof message === 'string' && message.length > 0);
}

/**
 * Derived attributes for one departure
 */
export function buildAttributes(
    departure: RawDeparture,
    now: Date,
    options: ViewOptions = DEFAULT_VIEW_OPTIONS
): DepartureAttributes {
    const attributes: DepartureAttributes = {
        line: departure.line?.designation ?? null,
        destination: departure.destination ?? null,
        scheduledTime: departure.scheduled ?? null,
        expectedTime: departure.expected ?? null,
        timeFormatted: formatClock(departure.expected, options.timeZone),
        minutesUntil: minutesUntil(departure.expected, now),
        transportMode: departure.line?.transport_mode ?? null,
        realTime: departure.journey?.prediction_state === REALTIME_PREDICTION_STATE,
        delayMinutes: delayMinutes(departure.scheduled, departure.expected) ?? 0,
        canceled: isCancelled(departure),
        platform: departure.stop_point?.designation ?? null,
        agency: options.agency,
        direction: departure.direction ?? null,
        state: departure.state ?? null,
        stopArea: departure.stop_area?.name ?? null,
    };

    const messages = deviationMessages(departure);
    if (messages.length > 0) {
        attributes.deviations = messages;
    }

    return attributes;
}

/**
 * Countdown text for the next-active view: "Nu", "7 min" or "14:32"
 * Falls back to the upstream display string without a usable expected time.
 */
export function countdownValue(
    departure: RawDeparture,
    now: Date,
    options: ViewOptions = DEFAULT_VIEW_OPTIONS
): string | null {
    const fallback = departure.display ?? null;
    if (!parseTimestamp(departure.expected)) {
        return fallback;
    }

    const minutes = minutesUntil(departure.expected, now);
    if (minutes === 0) {
        return options.nowLabel;
    }
    if (minutes < 60) {
        return `${minutes} min`;
    }
    return formatClock(departure.expected, options.timeZone) ?? fallback;
}

function deriveSlots(
    departures: readonly RawDeparture[],
    count: number,
    now: Date,
    options: ViewOptions
): SlotState[] {
    const slots: SlotState[] = [];
    for (let index = 0; index < Math.max(0, count); index++) {
        const departure = index < departures.length ? departures[index] : undefined;
        slots.push({
            index,
            label: slotLabel(index),
            value: departure?.display ?? null,
            attributes: departure ? buildAttributes(departure, now, options) : null,
            available: departure !== undefined,
        });
    }
    return slots;
}

/**
 * Derive the presentation state for one view policy
 * Pure function of (departures, now); safe to recompute on every read.
 */
export function deriveView(
    policy: ViewPolicy,
    departures: readonly RawDeparture[],
    now: Date = new Date(),
    options: ViewOptions = DEFAULT_VIEW_OPTIONS
): ViewState {
    if (policy.kind === 'slots') {
        return { kind: 'slots', slots: deriveSlots(departures, policy.count, now, options) };
    }

    const upcoming = departures.map(departure => buildAttributes(departure, now, options));
    const available = departures.length > 0;

    if (policy.kind === 'next') {
        return {
            kind: 'next',
            value: available ? (departures[0].display ?? null) : null,
            attributes: { upcoming },
            available,
        };
    }

    const active = departures.find(departure => !isCancelled(departure));
    return {
        kind: 'nextActive',
        value: active ? countdownValue(active, now, options) : null,
        attributes: { upcoming },
        available,
    };
}
