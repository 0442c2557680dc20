import { z } from 'zod';
import { Carrier } from './models';

export const carrierSchema = z.nativeEnum(Carrier, {
    errorMap: () => ({ message: `Carrier must be one of: ${Object.values(Carrier).join(', ')}` }),
});

export const trackingNumberSchema = z.string()
    .trim()
    .min(1, 'Tracking number is required')
    .max(50, 'Tracking number seems too long');

export const trackingRequestSchema = z.object({
    trackingNumber: trackingNumberSchema,
    carrier: carrierSchema,
});

export const trackingBatchSchema = z.object({
    carrier: carrierSchema,
    trackingNumbers: z.array(trackingNumberSchema)
        .min(1, 'At least one tracking number is required'),
});

export const trackingRequestListSchema = z.array(trackingRequestSchema)
    .min(1, 'At least one tracking request is required');

export function validateTrackingRequest(input: unknown) {
    return trackingRequestSchema.parse(input);
}
export function validateTrackingBatch(input: unknown) {
    return trackingBatchSchema.parse(input);
}
export function validateTrackingRequestList(input: unknown) {
    return trackingRequestListSchema.parse(input);
}
