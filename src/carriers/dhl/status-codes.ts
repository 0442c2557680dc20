import { TrackingStatus } from '../../domain/models';

// Matched in order against the latest event's description; first hit wins.
export const DHL_EVENT_PHRASES: ReadonlyArray<readonly [string, TrackingStatus]> = [
    ['out for delivery', TrackingStatus.OutForDelivery],
    ['delivery attempted', TrackingStatus.Exception],
    ['delivered', TrackingStatus.Delivered],
    ['returned', TrackingStatus.Exception],
    ['exception', TrackingStatus.Exception],
    ['delayed', TrackingStatus.Exception],
    ['unable', TrackingStatus.Exception],
    ['label created', TrackingStatus.LabelCreated],
    ['electronic notification', TrackingStatus.LabelCreated],
    ['picked up', TrackingStatus.InTransit],
    ['processed', TrackingStatus.InTransit],
    ['departed', TrackingStatus.InTransit],
    ['arrived', TrackingStatus.InTransit],
    ['arrival', TrackingStatus.InTransit],
    ['in transit', TrackingStatus.InTransit],
    ['tendered', TrackingStatus.InTransit],
];

export function mapDhlStatus(description: string | undefined): TrackingStatus {
    if (!description) return TrackingStatus.Unknown;
    const lower = description.toLowerCase();
    const hit = DHL_EVENT_PHRASES.find(([phrase]) => lower.includes(phrase));
    return hit ? hit[1] : TrackingStatus.Unknown;
}
