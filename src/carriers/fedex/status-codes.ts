import { TrackingStatus } from '../../domain/models';

// latestStatusDetail.code / scanEvents[].eventType
export const FEDEX_STATUS_CODES: Record<string, TrackingStatus> = {
    OC: TrackingStatus.LabelCreated,      // shipment information sent to FedEx
    PU: TrackingStatus.InTransit,         // picked up
    PX: TrackingStatus.InTransit,         // picked up (express)
    AA: TrackingStatus.InTransit,         // at airport
    AF: TrackingStatus.InTransit,         // at local FedEx facility
    AP: TrackingStatus.InTransit,         // at pickup
    AR: TrackingStatus.InTransit,         // arrived at
    CC: TrackingStatus.InTransit,         // cleared customs
    DP: TrackingStatus.InTransit,         // departed
    EP: TrackingStatus.InTransit,         // enroute to pickup
    FD: TrackingStatus.InTransit,         // at FedEx destination
    HL: TrackingStatus.InTransit,         // hold at location
    IT: TrackingStatus.InTransit,         // in transit
    IX: TrackingStatus.InTransit,         // in transit (see details)
    LO: TrackingStatus.InTransit,         // left FedEx origin facility
    OF: TrackingStatus.InTransit,         // at FedEx origin facility
    OX: TrackingStatus.InTransit,         // shipment information sent to USPS
    PL: TrackingStatus.InTransit,         // plane landed
    PM: TrackingStatus.InTransit,         // in progress
    SF: TrackingStatus.InTransit,         // at sort facility
    OD: TrackingStatus.OutForDelivery,
    DL: TrackingStatus.Delivered,
    CA: TrackingStatus.Exception,         // shipment cancelled
    CD: TrackingStatus.Exception,         // clearance delay
    DE: TrackingStatus.Exception,         // delivery exception
    DY: TrackingStatus.Exception,         // delay
    RS: TrackingStatus.Exception,         // return to shipper
    SE: TrackingStatus.Exception,         // shipment exception
};

export function mapFedExStatus(code: string | undefined): TrackingStatus {
    if (!code) return TrackingStatus.Unknown;
    return FEDEX_STATUS_CODES[code.toUpperCase()] ?? TrackingStatus.Unknown;
}
