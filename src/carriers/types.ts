import { AuthToken, Carrier, TrackingResult } from '../domain/models';
import { HttpClient } from '../http/client';
import { RetryPolicy } from '../tracking/retry-policy';

export interface AuthProvider {
    readonly carrier: Carrier;
    getToken(): Promise<AuthToken>;
    /** Drops the cached token, unless a newer one has replaced `rejected` already. */
    invalidate(rejected?: AuthToken): void;
}

export interface CarrierProfile {
    /** Published per-call maximum the service layer enforces; undefined means unbounded. */
    readonly maxBatchSize?: number;
    /** Tracking numbers per physical HTTP request. */
    readonly maxPerRequest: number;
    /** Physical requests in flight at once for one batch. */
    readonly concurrency: number;
}

/**
 * One carrier variant. `fetchChunk` issues a single physical request (or,
 * for carriers without a batch endpoint, the request for a single number)
 * and returns results keyed by canonical tracking number. Numbers the
 * carrier left out of its response are simply absent from the map.
 */
export interface CarrierTracker<C extends Carrier = Carrier> {
    readonly carrier: C;
    readonly profile: CarrierProfile;
    fetchChunk(trackingNumbers: readonly string[], signal?: AbortSignal): Promise<Map<string, TrackingResult>>;
}

/** The slice of CarrierAuthManager a tracker needs. */
export interface TokenSource {
    getToken(carrier: Carrier): Promise<AuthToken>;
}

export interface TrackerDeps {
    http: HttpClient;
    auth: TokenSource;
    retry: RetryPolicy;
    profile?: CarrierProfile;
}
