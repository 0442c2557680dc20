import { TrackingStatus } from '../../domain/models';

// Event <Status> codes
export const ONTRAC_STATUS_CODES: Record<string, TrackingStatus> = {
    XX: TrackingStatus.LabelCreated,    // data entry
    OE: TrackingStatus.LabelCreated,
    PU: TrackingStatus.InTransit,
    OS: TrackingStatus.InTransit,       // on site
    PS: TrackingStatus.InTransit,
    RD: TrackingStatus.InTransit,       // received at facility
    OD: TrackingStatus.OutForDelivery,
    DL: TrackingStatus.Delivered,
    CL: TrackingStatus.Delivered,
    DW: TrackingStatus.Delivered,
    OK: TrackingStatus.Delivered,
    DN: TrackingStatus.Delivered,
    CR: TrackingStatus.Exception,       // refused
    DC: TrackingStatus.Exception,
    DR: TrackingStatus.Exception,       // damaged
    UD: TrackingStatus.Exception,       // undeliverable
    UM: TrackingStatus.Exception,
    RS: TrackingStatus.Exception,       // return to sender
};

export function mapOnTracStatus(code: string | undefined): TrackingStatus {
    if (!code) return TrackingStatus.Unknown;
    return ONTRAC_STATUS_CODES[code.trim().toUpperCase()] ?? TrackingStatus.Unknown;
}
