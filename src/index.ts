export {
    Carrier,
    CARRIER_LABELS,
    TrackingStatus,
    type TrackingRequest,
    type AuthToken,
    type Location,
    type TrackingEvent,
    type Weight,
    type TrackingResult,
} from './domain/models';
export {
    validateTrackingRequest,
    validateTrackingBatch,
    validateTrackingRequestList,
} from './domain/schemas';
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
} from './domain/errors';
export type { AuthProvider, CarrierProfile, CarrierTracker, TrackerDeps } from './carriers/types';
export { validateTrackingNumber, canonicalTrackingNumber, computeOnTracCheckDigit } from './carriers/validation';
export { normalize } from './carriers/normalizer';
export { DEFAULT_PROFILES } from './carriers/profiles';
export { TrackerRegistry } from './carriers/registry';
export { CarrierAuthManager } from './carriers/auth/manager';
export { OAuthClientCredentialsProvider } from './carriers/auth/oauth-provider';
export { StaticCredentialProvider } from './carriers/auth/static-provider';
export { FedExTracker } from './carriers/fedex/tracker';
export { UpsTracker } from './carriers/ups/tracker';
export { DhlTracker } from './carriers/dhl/tracker';
export { OnTracTracker } from './carriers/ontrac/tracker';
export { RetryPolicy, type RetryOptions } from './tracking/retry-policy';
export { runTrackerBatch } from './tracking/batch';
export { TrackingOrchestrator, type TrackOptions } from './tracking/orchestrator';
export { createTrackingRuntime } from './bootstrap';
export {
    TrackingService,
    type TrackingNumberCheck,
    type TrackingResponse,
    type CarrierCapability,
} from './services/tracking.service';
export { AuditRepository } from './db/repository';
export { loadConfig } from './config';
export type { AppConfig, OAuthCarrierConfig, UpsConfig, OnTracConfig } from './config';
