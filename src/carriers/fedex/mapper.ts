import { z } from 'zod';
import { Carrier, TrackingEvent, TrackingResult, TrackingStatus } from '../../domain/models';
import { ParseError } from '../../domain/errors';
import { canonicalTrackingNumber } from '../validation';
import {
    buildLocation,
    buildResult,
    describeZodError,
    errorResult,
    formatLocation,
    latestEvent,
    notFoundResult,
    parseTimestamp,
    parseWeight,
} from '../result-helpers';
import { mapFedExStatus } from './status-codes';

const addressSchema = z.object({
    streetLines: z.array(z.string()).optional(),
    city: z.string().optional(),
    stateOrProvinceCode: z.string().optional(),
    postalCode: z.string().optional(),
    countryCode: z.string().optional(),
});

const scanEventSchema = z.object({
    date: z.string().optional(),
    eventType: z.string().optional(),
    eventDescription: z.string().optional(),
    derivedStatusCode: z.string().optional(),
    scanLocation: addressSchema.optional(),
});

const trackResultSchema = z.object({
    error: z.object({
        code: z.string().optional(),
        message: z.string().optional(),
    }).optional(),
    latestStatusDetail: z.object({
        code: z.string().optional(),
        derivedCode: z.string().optional(),
        description: z.string().optional(),
    }).optional(),
    dateAndTimes: z.array(z.object({
        type: z.string(),
        dateTime: z.string(),
    })).optional(),
    scanEvents: z.array(scanEventSchema).optional(),
    shipperInformation: z.object({ address: addressSchema.optional() }).optional(),
    recipientInformation: z.object({ address: addressSchema.optional() }).optional(),
    deliveryDetails: z.object({
        actualDeliveryAddress: addressSchema.optional(),
        locationDescription: z.string().optional(),
    }).optional(),
    estimatedDeliveryTimeWindow: z.object({
        window: z.object({ ends: z.string().optional() }).optional(),
    }).optional(),
    serviceDetail: z.object({
        type: z.string().optional(),
        description: z.string().optional(),
    }).optional(),
    packageDetails: z.object({
        weightAndDimensions: z.object({
            weight: z.array(z.object({
                value: z.union([z.string(), z.number()]).optional(),
                unit: z.string().optional(),
            })).optional(),
        }).optional(),
    }).optional(),
    additionalTrackingInfo: z.object({
        packageIdentifiers: z.array(z.object({
            type: z.string().optional(),
            values: z.array(z.string()).optional(),
        })).optional(),
    }).optional(),
});

const completeTrackResultSchema = z.object({
    trackingNumber: z.string(),
    trackResults: z.array(trackResultSchema),
});

const envelopeSchema = z.object({
    output: z.object({
        completeTrackResults: z.array(z.unknown()),
    }),
});

const identifiedResultSchema = z.object({ trackingNumber: z.string().min(1) });

type FedExAddress = z.infer<typeof addressSchema>;
type FedExTrackResult = z.infer<typeof trackResultSchema>;

/**
 * Splits a Track API batch response into one raw entry per tracking number.
 * Entries without a tracking number are skipped.
 */
export function fedexResultsByNumber(raw: unknown): Map<string, unknown> {
    const parsed = envelopeSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ParseError('fedex', `Unexpected FedEx tracking response: ${describeZodError(parsed.error)}`);
    }
    const byNumber = new Map<string, unknown>();
    parsed.data.output.completeTrackResults.forEach((entry, index) => {
        const identified = identifiedResultSchema.safeParse(entry);
        if (!identified.success) {
            console.warn(`[fedex] Skipping track result ${index} without a trackingNumber: ${describeZodError(identified.error)}`);
            return;
        }
        byNumber.set(canonicalTrackingNumber(identified.data.trackingNumber), entry);
    });
    return byNumber;
}

export function normalizeFedEx(trackingNumber: string, raw: unknown): TrackingResult {
    const parsed = completeTrackResultSchema.safeParse(raw);
    if (!parsed.success) {
        return errorResult(Carrier.FedEx, trackingNumber, `Malformed FedEx tracking data (${describeZodError(parsed.error)})`);
    }

    const track = parsed.data.trackResults[0];
    if (!track) {
        return errorResult(Carrier.FedEx, trackingNumber, 'No tracking results found');
    }
    if (track.error) {
        const message = track.error.message ?? track.error.code ?? 'FedEx returned an error';
        return track.error.code?.includes('NOTFOUND')
            ? notFoundResult(Carrier.FedEx, trackingNumber, message)
            : errorResult(Carrier.FedEx, trackingNumber, message);
    }
    if (!track.latestStatusDetail) {
        return errorResult(Carrier.FedEx, trackingNumber, 'FedEx response missing latestStatusDetail');
    }

    const status = mapFedExStatus(track.latestStatusDetail.code ?? track.latestStatusDetail.derivedCode);
    const events = mapScanEvents(track);
    const deliveredAt = findDateTime(track, 'ACTUAL_DELIVERY')
        ?? (status === TrackingStatus.Delivered ? latestEvent(events.filter(e => e.statusCode === 'DL'))?.timestamp : undefined);

    return buildResult(Carrier.FedEx, trackingNumber, {
        status,
        estimatedDelivery: findDateTime(track, 'ESTIMATED_DELIVERY')
            ?? parseTimestamp(track.estimatedDeliveryTimeWindow?.window?.ends),
        deliveredAt,
        events,
        origin: mapAddress(track.shipperInformation?.address),
        destination: mapAddress(track.recipientInformation?.address),
        deliveryAddress: formatLocation(mapAddress(track.deliveryDetails?.actualDeliveryAddress))
            ?? track.deliveryDetails?.locationDescription,
        serviceType: track.serviceDetail?.description ?? track.serviceDetail?.type,
        weight: mapWeight(track),
        referenceNumbers: (track.additionalTrackingInfo?.packageIdentifiers ?? [])
            .flatMap(id => id.values ?? []),
    });
}

function mapScanEvents(track: FedExTrackResult): TrackingEvent[] {
    const events: TrackingEvent[] = [];
    for (const scan of track.scanEvents ?? []) {
        const timestamp = parseTimestamp(scan.date);
        if (!timestamp) continue;
        events.push({
            timestamp,
            statusCode: scan.eventType ?? scan.derivedStatusCode ?? '',
            description: scan.eventDescription ?? '',
            location: mapAddress(scan.scanLocation),
        });
    }
    return events;
}

function findDateTime(track: FedExTrackResult, type: string): Date | undefined {
    const entry = track.dateAndTimes?.find(d => d.type === type);
    return parseTimestamp(entry?.dateTime);
}

function mapAddress(address: FedExAddress | undefined) {
    if (!address) return undefined;
    return buildLocation({
        city: address.city,
        state: address.stateOrProvinceCode,
        zip: address.postalCode,
        country: address.countryCode,
    });
}

function mapWeight(track: FedExTrackResult) {
    const weights = track.packageDetails?.weightAndDimensions?.weight ?? [];
    const preferred = weights.find(w => w.unit === 'LB') ?? weights[0];
    return preferred ? parseWeight(preferred.value, preferred.unit) : undefined;
}
