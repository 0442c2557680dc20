export { Carrier, CARRIER_LABELS, TrackingStatus } from './models';
export type {
    TrackingRequest,
    AuthToken,
    Location,
    TrackingEvent,
    Weight,
    TrackingResult,
} from './models';

export {
    carrierSchema,
    trackingNumberSchema,
    trackingRequestSchema,
    trackingBatchSchema,
    trackingRequestListSchema,
    validateTrackingRequest,
    validateTrackingBatch,
    validateTrackingRequestList,
} from './schemas';

export {
    CarrierError,
    AuthenticationError,
    RateLimitError,
    TransientNetworkError,
    TimeoutError,
    CarrierBusinessError,
    TimeoutExceededError,
    TrackingError,
    ValidationError,
    ParseError,
} from './errors';
export type { ErrorCode } from './errors';
