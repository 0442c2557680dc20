import { TrackingStatus } from '../../domain/models';

// currentStatus.type / activity[].status.type
export const UPS_STATUS_TYPES: Record<string, TrackingStatus> = {
    M: TrackingStatus.LabelCreated,     // manifest pickup
    P: TrackingStatus.InTransit,        // pickup
    I: TrackingStatus.InTransit,
    W: TrackingStatus.InTransit,        // warehousing
    O: TrackingStatus.OutForDelivery,
    D: TrackingStatus.Delivered,
    X: TrackingStatus.Exception,
    RS: TrackingStatus.Exception,       // returned to shipper
    MV: TrackingStatus.Exception,       // manifest voided
};

export function mapUpsStatus(type: string | undefined): TrackingStatus {
    if (!type) return TrackingStatus.Unknown;
    return UPS_STATUS_TYPES[type.toUpperCase()] ?? TrackingStatus.Unknown;
}
