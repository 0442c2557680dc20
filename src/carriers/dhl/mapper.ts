import { z } from 'zod';
import { Carrier, Location, TrackingEvent, TrackingResult, TrackingStatus } from '../../domain/models';
import { ParseError } from '../../domain/errors';
import { canonicalTrackingNumber } from '../validation';
import {
    buildLocation,
    buildResult,
    clean,
    describeZodError,
    errorResult,
    formatLocation,
    latestEvent,
    parseTimestamp,
    parseWeight,
} from '../result-helpers';
import { mapDhlStatus } from './status-codes';

const eventSchema = z.object({
    primaryEventId: z.union([z.string(), z.number()]).optional(),
    primaryEventDescription: z.string().optional(),
    secondaryEventDescription: z.string().optional(),
    date: z.string().optional(),
    time: z.string().optional(),
    location: z.string().optional(),
});

const packageEntrySchema = z.object({
    package: z.object({
        trackingId: z.string().optional(),
        expectedDelivery: z.string().optional(),
        productName: z.string().optional(),
        weight: z.object({
            value: z.union([z.string(), z.number()]).optional(),
            unitOfMeasure: z.string().optional(),
        }).optional(),
        customerReference: z.string().optional(),
        billingReference1: z.string().optional(),
    }),
    events: z.array(eventSchema).optional(),
    recipient: z.object({
        city: z.string().optional(),
        state: z.string().optional(),
        postalCode: z.string().optional(),
        country: z.string().optional(),
    }).optional(),
});

const envelopeSchema = z.object({
    packages: z.array(z.unknown()),
});

const identifiedPackageSchema = z.object({
    package: z.object({ trackingId: z.string().min(1) }),
});

type DhlEvent = z.infer<typeof eventSchema>;

interface MappedEvent {
    event: TrackingEvent;
    primaryDescription: string;
}

/**
 * Splits a package/open response into one raw entry per tracking id. Entries
 * without a tracking id are skipped; their numbers end up NOT_FOUND.
 */
export function dhlPackagesByNumber(raw: unknown): Map<string, unknown> {
    const parsed = envelopeSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ParseError('dhl', `Unexpected DHL tracking response: ${describeZodError(parsed.error)}`);
    }
    const byNumber = new Map<string, unknown>();
    parsed.data.packages.forEach((entry, index) => {
        const identified = identifiedPackageSchema.safeParse(entry);
        if (!identified.success) {
            console.warn(`[dhl] Skipping package ${index} without a trackingId: ${describeZodError(identified.error)}`);
            return;
        }
        byNumber.set(canonicalTrackingNumber(identified.data.package.trackingId), entry);
    });
    return byNumber;
}

export function normalizeDhl(trackingNumber: string, raw: unknown): TrackingResult {
    const parsed = packageEntrySchema.safeParse(raw);
    if (!parsed.success) {
        return errorResult(Carrier.DHL, trackingNumber, `Malformed DHL tracking data (${describeZodError(parsed.error)})`);
    }

    const { package: pkg, recipient } = parsed.data;
    const mapped = (parsed.data.events ?? []).flatMap(mapEvent);
    const events = mapped.map(m => m.event);
    const latest = latestEvent(events);
    // status comes from the primary description; the secondary one is free text
    const status = latest
        ? mapDhlStatus(mapped.find(m => m.event === latest)?.primaryDescription)
        : TrackingStatus.Pending;
    const destination = recipient
        ? buildLocation({
            city: recipient.city,
            state: recipient.state,
            zip: recipient.postalCode,
            country: recipient.country,
        })
        : undefined;

    return buildResult(Carrier.DHL, trackingNumber, {
        status,
        estimatedDelivery: parseTimestamp(pkg.expectedDelivery),
        deliveredAt: status === TrackingStatus.Delivered ? latest?.timestamp : undefined,
        events,
        destination,
        deliveryAddress: formatLocation(destination),
        serviceType: clean(pkg.productName),
        weight: pkg.weight ? parseWeight(pkg.weight.value, pkg.weight.unitOfMeasure) : undefined,
        referenceNumbers: [pkg.customerReference, pkg.billingReference1],
    });
}

function mapEvent(event: DhlEvent): MappedEvent[] {
    if (!event.date) return [];
    const timestamp = parseTimestamp(event.time ? `${event.date}T${event.time}` : event.date);
    if (!timestamp) return [];
    const primaryDescription = event.primaryEventDescription ?? '';
    return [{
        event: {
            timestamp,
            statusCode: event.primaryEventId === undefined ? '' : String(event.primaryEventId),
            description: clean(event.secondaryEventDescription) ?? primaryDescription,
            location: parseLocationLine(event.location),
        },
        primaryDescription,
    }];
}

/** `"Memphis, TN US"` or `"Memphis, TN 38118 US"` style event locations. */
function parseLocationLine(line: string | undefined): Location | undefined {
    const value = clean(line);
    if (!value) return undefined;
    const [city, rest] = value.split(',', 2);
    const parts = (rest ?? '').trim().split(/\s+/).filter(Boolean);
    const state = parts.length > 0 ? parts[0] : undefined;
    const country = parts.length > 1 ? parts[parts.length - 1] : undefined;
    const zip = parts.length > 2 ? parts[1] : undefined;
    return buildLocation({ city, state, zip, country });
}
