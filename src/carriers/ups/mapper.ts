import { z } from 'zod';
import { Carrier, TrackingEvent, TrackingResult, TrackingStatus } from '../../domain/models';
import {
    buildLocation,
    buildResult,
    describeZodError,
    errorResult,
    latestEvent,
    notFoundResult,
    parseCompactDateTime,
    parseWeight,
} from '../result-helpers';
import { mapUpsStatus } from './status-codes';

const addressSchema = z.object({
    city: z.string().optional(),
    stateProvince: z.string().optional(),
    postalCode: z.string().optional(),
    country: z.string().optional(),
    countryCode: z.string().optional(),
});

const activitySchema = z.object({
    date: z.string().optional(),
    time: z.string().optional(),
    status: z.object({
        type: z.string().optional(),
        code: z.string().optional(),
        description: z.string().optional(),
    }).optional(),
    location: z.object({ address: addressSchema.optional() }).optional(),
});

const packageSchema = z.object({
    trackingNumber: z.string().optional(),
    currentStatus: z.object({
        type: z.string().optional(),
        code: z.string().optional(),
        description: z.string().optional(),
    }).optional(),
    deliveryDate: z.array(z.object({
        type: z.string().optional(),
        date: z.string(),
    })).optional(),
    deliveryTime: z.object({
        type: z.string().optional(),
        endTime: z.string().optional(),
    }).optional(),
    deliveryInformation: z.object({
        location: z.string().optional(),
    }).optional(),
    activity: z.array(activitySchema).optional(),
    packageAddress: z.array(z.object({
        type: z.string().optional(),
        address: addressSchema.optional(),
    })).optional(),
    referenceNumber: z.array(z.object({
        type: z.string().optional(),
        number: z.string().optional(),
    })).optional(),
    service: z.object({ description: z.string().optional() }).optional(),
    weight: z.object({
        weight: z.string().optional(),
        unitOfMeasurement: z.string().optional(),
    }).optional(),
});

const trackResponseSchema = z.object({
    trackResponse: z.object({
        shipment: z.array(z.object({
            package: z.array(packageSchema).optional(),
            warnings: z.array(z.object({
                code: z.string().optional(),
                message: z.string().optional(),
            })).optional(),
        })),
    }),
});

type UpsAddress = z.infer<typeof addressSchema>;
type UpsPackage = z.infer<typeof packageSchema>;

export function normalizeUps(trackingNumber: string, raw: unknown): TrackingResult {
    const parsed = trackResponseSchema.safeParse(raw);
    if (!parsed.success) {
        return errorResult(Carrier.UPS, trackingNumber, `Malformed UPS tracking data (${describeZodError(parsed.error)})`);
    }

    const shipment = parsed.data.trackResponse.shipment[0];
    if (!shipment) {
        return errorResult(Carrier.UPS, trackingNumber, 'No shipment data found in UPS response');
    }
    const pkg = shipment.package?.[0];
    if (!pkg) {
        const warning = shipment.warnings?.[0];
        return warning
            ? notFoundResult(Carrier.UPS, trackingNumber, warning.message ?? warning.code)
            : errorResult(Carrier.UPS, trackingNumber, 'No package data found in UPS response');
    }

    const status = mapUpsStatus(pkg.currentStatus?.type);
    const events = mapActivity(pkg);
    const delivered = pkg.deliveryDate?.find(d => d.type === 'DEL');
    const estimated = pkg.deliveryDate?.find(d => d.type !== 'DEL');
    const deliveryTime = pkg.deliveryTime?.endTime;

    return buildResult(Carrier.UPS, trackingNumber, {
        status,
        estimatedDelivery: estimated ? parseCompactDateTime(estimated.date, deliveryTime) : undefined,
        deliveredAt: delivered
            ? parseCompactDateTime(delivered.date, deliveryTime)
            : status === TrackingStatus.Delivered ? latestEvent(events.filter(e => e.statusCode === 'D'))?.timestamp : undefined,
        events,
        origin: mapAddress(findAddress(pkg, 'ORIGIN')),
        destination: mapAddress(findAddress(pkg, 'DESTINATION')),
        deliveryAddress: pkg.deliveryInformation?.location,
        serviceType: pkg.service?.description,
        weight: pkg.weight ? parseWeight(pkg.weight.weight, pkg.weight.unitOfMeasurement) : undefined,
        referenceNumbers: (pkg.referenceNumber ?? []).map(ref => ref.number),
    });
}

function mapActivity(pkg: UpsPackage): TrackingEvent[] {
    const events: TrackingEvent[] = [];
    for (const activity of pkg.activity ?? []) {
        const timestamp = parseCompactDateTime(activity.date, activity.time);
        if (!timestamp) continue;
        events.push({
            timestamp,
            statusCode: activity.status?.type ?? activity.status?.code ?? '',
            description: activity.status?.description ?? '',
            location: mapAddress(activity.location?.address),
        });
    }
    return events;
}

function findAddress(pkg: UpsPackage, type: string): UpsAddress | undefined {
    return pkg.packageAddress?.find(a => a.type === type)?.address;
}

function mapAddress(address: UpsAddress | undefined) {
    if (!address) return undefined;
    return buildLocation({
        city: address.city,
        state: address.stateProvince,
        zip: address.postalCode,
        country: address.countryCode ?? address.country,
    });
}
