import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { Carrier, TrackingEvent, TrackingResult, TrackingStatus } from '../../domain/models';
import { isRecord } from '../../utils/guards';
import {
    buildLocation,
    buildResult,
    clean,
    describeZodError,
    errorResult,
    latestEvent,
    notFoundResult,
    parseTimestamp,
    parseWeight,
} from '../result-helpers';
import { mapOnTracStatus } from './status-codes';

const SERVICE_NAMES: Record<string, string> = {
    C: 'OnTrac Ground',
    S: 'OnTrac Sunrise',
    G: 'OnTrac Gold',
};

const parser = new XMLParser({
    ignoreAttributes: true,
    parseTagValue: false,
    trimValues: true,
    isArray: name => name === 'Event' || name === 'Shipment',
});

// empty elements come back as ''
const text = z.string().optional();

const eventSchema = z.object({
    Status: text,
    Description: text,
    EventTime: text,
    City: text,
    State: text,
    Zip: text,
});

const shipmentSchema = z.object({
    Tracking: text,
    Delivered: text,
    Service: text,
    Weight: text,
    Exp_Del_Date: text,
    City: text,
    State: text,
    Zip: text,
    Reference: text,
    Reference2: text,
    Events: z.union([
        z.object({ Event: z.array(eventSchema).optional() }),
        z.string(),
    ]).optional(),
});

type OnTracEvent = z.infer<typeof eventSchema>;

/**
 * Parses a V7 shipments response body. The raw payload is the XML text.
 */
export function normalizeOnTrac(trackingNumber: string, raw: unknown): TrackingResult {
    if (typeof raw !== 'string' || !raw.trim()) {
        return errorResult(Carrier.OnTrac, trackingNumber, 'Empty OnTrac tracking response');
    }

    let document: unknown;
    try {
        document = parser.parse(raw, true);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        return errorResult(Carrier.OnTrac, trackingNumber, `Invalid XML response from OnTrac: ${reason}`);
    }

    const carrierError = findElement(document, 'Error');
    if (typeof carrierError === 'string' && carrierError.trim()) {
        const message = `OnTrac API error: ${carrierError.trim()}`;
        return /not found|invalid/i.test(carrierError)
            ? notFoundResult(Carrier.OnTrac, trackingNumber, message)
            : errorResult(Carrier.OnTrac, trackingNumber, message);
    }

    const shipments = findElement(document, 'Shipment');
    const first: unknown = Array.isArray(shipments) ? shipments[0] : undefined;
    if (first === undefined) {
        return notFoundResult(Carrier.OnTrac, trackingNumber, 'No shipment data found in OnTrac response');
    }

    const parsed = shipmentSchema.safeParse(first);
    if (!parsed.success) {
        return errorResult(Carrier.OnTrac, trackingNumber, `Malformed OnTrac tracking data (${describeZodError(parsed.error)})`);
    }
    const shipment = parsed.data;

    const rawEvents = typeof shipment.Events === 'object' ? shipment.Events.Event ?? [] : [];
    const events = rawEvents.flatMap(mapEvent);
    const latest = latestEvent(events);
    const delivered = shipment.Delivered?.trim().toLowerCase() === 'true';
    const status = delivered ? TrackingStatus.Delivered : mapOnTracStatus(latest?.statusCode);
    const serviceCode = clean(shipment.Service);

    return buildResult(Carrier.OnTrac, trackingNumber, {
        status,
        estimatedDelivery: parseTimestamp(clean(shipment.Exp_Del_Date)),
        deliveredAt: status === TrackingStatus.Delivered ? latest?.timestamp : undefined,
        events,
        destination: buildLocation({ city: shipment.City, state: shipment.State, zip: shipment.Zip }),
        serviceType: serviceCode ? SERVICE_NAMES[serviceCode] ?? serviceCode : undefined,
        weight: parseWeight(clean(shipment.Weight), 'LB'),
        referenceNumbers: [shipment.Reference, shipment.Reference2],
    });
}

function mapEvent(event: OnTracEvent): TrackingEvent[] {
    const timestamp = parseTimestamp(clean(event.EventTime));
    if (!timestamp) return [];
    return [{
        timestamp,
        statusCode: clean(event.Status) ?? '',
        description: clean(event.Description) ?? '',
        location: buildLocation({ city: event.City, state: event.State, zip: event.Zip }),
    }];
}

/** Depth-first search for the first element with the given tag name. */
function findElement(node: unknown, name: string): unknown {
    if (Array.isArray(node)) {
        for (const item of node) {
            const found = findElement(item, name);
            if (found !== undefined) return found;
        }
        return undefined;
    }
    if (!isRecord(node)) return undefined;
    if (name in node) return node[name];
    for (const value of Object.values(node)) {
        const found = findElement(value, name);
        if (found !== undefined) return found;
    }
    return undefined;
}
