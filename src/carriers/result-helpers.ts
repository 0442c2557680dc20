import { ZodError } from 'zod';
import {
    Carrier,
    CARRIER_LABELS,
    Location,
    TrackingEvent,
    TrackingResult,
    TrackingStatus,
    Weight,
} from '../domain/models';

type ResultFields = Omit<TrackingResult, 'trackingNumber' | 'carrier' | 'referenceNumbers' | 'events'> & {
    events?: readonly TrackingEvent[];
    referenceNumbers?: readonly (string | undefined)[];
};

export function buildResult(carrier: Carrier, trackingNumber: string, fields: ResultFields): TrackingResult {
    const { events, referenceNumbers, ...rest } = fields;
    return {
        trackingNumber,
        carrier,
        ...rest,
        events: chronological(events ?? []),
        referenceNumbers: uniqueStrings(referenceNumbers ?? []),
    };
}

export function errorResult(carrier: Carrier, trackingNumber: string, errorMessage: string): TrackingResult {
    return buildResult(carrier, trackingNumber, { status: TrackingStatus.Error, errorMessage });
}

export function notFoundResult(carrier: Carrier, trackingNumber: string, errorMessage?: string): TrackingResult {
    return buildResult(carrier, trackingNumber, {
        status: TrackingStatus.NotFound,
        errorMessage: errorMessage ?? `${CARRIER_LABELS[carrier]} has no record of tracking number ${trackingNumber}`,
    });
}

export function invalidFormatResult(carrier: Carrier, trackingNumber: string): TrackingResult {
    return notFoundResult(
        carrier,
        trackingNumber,
        `Invalid ${CARRIER_LABELS[carrier]} tracking number format: ${trackingNumber}`,
    );
}

/** Stable ascending sort by timestamp. */
export function chronological(events: readonly TrackingEvent[]): TrackingEvent[] {
    return events
        .map((event, index) => ({ event, index }))
        .sort((a, b) => a.event.timestamp.getTime() - b.event.timestamp.getTime() || a.index - b.index)
        .map(({ event }) => event);
}

export function latestEvent(events: readonly TrackingEvent[]): TrackingEvent | undefined {
    const sorted = chronological(events);
    return sorted[sorted.length - 1];
}

/**
 * ISO-8601 timestamp. Values without an offset are carrier-local wall time;
 * with nothing better to go on they are read as UTC.
 */
export function parseTimestamp(value: string | undefined | null): Date | undefined {
    if (!value) return undefined;
    const trimmed = value.trim();
    const hasZone = /(Z|[+-]\d{2}:?\d{2})$/.test(trimmed);
    const isDateOnly = /^\d{4}-\d{2}-\d{2}$/.test(trimmed);
    const normalized = isDateOnly ? `${trimmed}T00:00:00Z` : hasZone ? trimmed : `${trimmed}Z`;
    const date = new Date(normalized);
    return isNaN(date.getTime()) ? undefined : date;
}

/** UPS style compact date and time: `20240110` + `143000`. */
export function parseCompactDateTime(date: string | undefined, time?: string): Date | undefined {
    if (!date || !/^\d{8}$/.test(date)) return undefined;
    const t = time && /^\d{6}$/.test(time) ? time : '000000';
    return parseTimestamp(
        `${date.slice(0, 4)}-${date.slice(4, 6)}-${date.slice(6, 8)}T${t.slice(0, 2)}:${t.slice(2, 4)}:${t.slice(4, 6)}`,
    );
}

export function buildLocation(fields: Location): Location | undefined {
    const city = clean(fields.city);
    const state = clean(fields.state);
    const zip = clean(fields.zip);
    const country = clean(fields.country);
    if (!city && !state && !zip && !country) return undefined;
    return { city, state, zip, country };
}

export function formatLocation(location: Location | undefined): string | undefined {
    if (!location) return undefined;
    const cityState = [location.city, location.state].filter(Boolean).join(', ');
    const line = [cityState, location.zip, location.country].filter(Boolean).join(' ');
    return line || undefined;
}

export function parseWeight(value: string | number | undefined, unit: string | undefined): Weight | undefined {
    if (value === undefined || value === '') return undefined;
    const numeric = typeof value === 'number' ? value : parseFloat(value);
    if (!Number.isFinite(numeric)) return undefined;
    return { value: numeric, unit: clean(unit) ?? 'LB' };
}

export function clean(value: string | undefined | null): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

function uniqueStrings(values: readonly (string | undefined)[]): string[] {
    const seen = new Set<string>();
    for (const value of values) {
        const cleaned = clean(value);
        if (cleaned) seen.add(cleaned);
    }
    return [...seen];
}

export function describeZodError(error: ZodError): string {
    const first = error.issues[0];
    if (!first) return 'unexpected payload shape';
    return `${first.path.join('.') || '(root)'}: ${first.message}`;
}
