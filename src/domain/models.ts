export enum Carrier {
    FedEx = 'fedex',
    UPS = 'ups',
    DHL = 'dhl',
    OnTrac = 'ontrac',
}

export const CARRIER_LABELS: Record<Carrier, string> = {
    [Carrier.FedEx]: 'FedEx',
    [Carrier.UPS]: 'UPS',
    [Carrier.DHL]: 'DHL',
    [Carrier.OnTrac]: 'OnTrac',
};

export enum TrackingStatus {
    InTransit = 'in_transit',
    OutForDelivery = 'out_for_delivery',
    Delivered = 'delivered',
    Exception = 'exception',
    Pending = 'pending',
    NotFound = 'not_found',
    LabelCreated = 'label_created',
    Unknown = 'unknown',
    Error = 'error',
}

export interface TrackingRequest {
    readonly trackingNumber: string;
    readonly carrier: Carrier;
}

export interface AuthToken {
    readonly carrier: Carrier;
    readonly bearerValue: string;
    readonly obtainedAt: Date;
    readonly expiresAt: Date;
}

export interface Location {
    readonly city?: string;
    readonly state?: string;
    readonly zip?: string;
    readonly country?: string;   // ISO 3166-1 alpha-2 when the carrier gives one
}

export interface TrackingEvent {
    readonly timestamp: Date;
    readonly statusCode: string;     // carrier-native
    readonly description: string;
    readonly location?: Location;
}

export interface Weight {
    readonly value: number;
    readonly unit: string;
}

export interface TrackingResult {
    readonly trackingNumber: string;
    readonly carrier: Carrier;
    readonly status: TrackingStatus;
    readonly estimatedDelivery?: Date;
    readonly deliveredAt?: Date;
    readonly events: readonly TrackingEvent[];   // oldest first
    readonly origin?: Location;
    readonly destination?: Location;
    readonly deliveryAddress?: string;
    readonly serviceType?: string;
    readonly weight?: Weight;
    readonly referenceNumbers: readonly string[];
    readonly errorMessage?: string;
}
