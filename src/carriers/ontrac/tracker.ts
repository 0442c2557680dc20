import { Carrier, TrackingResult } from '../../domain/models';
import { normalize } from '../normalizer';
import { DEFAULT_PROFILES } from '../profiles';
import { CarrierProfile, CarrierTracker, TrackerDeps } from '../types';

export interface OnTracTrackerDeps extends TrackerDeps {
    accountNumber: string;
}

/**
 * OnTrac authenticates with the API key as the `pw` query parameter and
 * answers in XML, one shipment per request.
 */
export class OnTracTracker implements CarrierTracker<Carrier.OnTrac> {
    readonly carrier = Carrier.OnTrac;
    readonly profile: CarrierProfile;

    constructor(private readonly deps: OnTracTrackerDeps) {
        this.profile = deps.profile ?? DEFAULT_PROFILES[Carrier.OnTrac];
    }

    async fetchChunk(trackingNumbers: readonly string[], signal?: AbortSignal): Promise<Map<string, TrackingResult>> {
        const results = new Map<string, TrackingResult>();
        for (const trackingNumber of trackingNumbers) {
            results.set(trackingNumber, await this.trackOne(trackingNumber, signal));
        }
        return results;
    }

    private async trackOne(trackingNumber: string, signal?: AbortSignal): Promise<TrackingResult> {
        const path = `/V7/${encodeURIComponent(this.deps.accountNumber)}/shipments`;
        const response = await this.deps.retry.execute(
            { carrier: this.carrier, trackingNumbers: [trackingNumber], signal },
            async (attempt) => {
                const token = await this.deps.auth.getToken(this.carrier);
                attempt.token = token;
                return this.deps.http.get<string>(path, {
                    headers: { 'Accept': 'application/xml' },
                    params: {
                        pw: token.bearerValue,
                        tn: trackingNumber,
                        requestType: 'track',
                    },
                    responseType: 'text',
                    signal,
                });
            },
        );
        return normalize(this.carrier, trackingNumber, response.data);
    }
}
