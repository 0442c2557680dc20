import { Carrier, TrackingResult } from '../../domain/models';
import { normalize } from '../normalizer';
import { DEFAULT_PROFILES } from '../profiles';
import { CarrierProfile, CarrierTracker, TrackerDeps } from '../types';
import { fedexResultsByNumber } from './mapper';

const TRACK_PATH = '/track/v1/trackingnumbers';

export class FedExTracker implements CarrierTracker<Carrier.FedEx> {
    readonly carrier = Carrier.FedEx;
    readonly profile: CarrierProfile;

    constructor(private readonly deps: TrackerDeps) {
        this.profile = deps.profile ?? DEFAULT_PROFILES[Carrier.FedEx];
    }

    async fetchChunk(trackingNumbers: readonly string[], signal?: AbortSignal): Promise<Map<string, TrackingResult>> {
        const body = {
            includeDetailedScans: true,
            trackingInfo: trackingNumbers.map(trackingNumber => ({ trackingNumberInfo: { trackingNumber } })),
        };

        const response = await this.deps.retry.execute(
            { carrier: this.carrier, trackingNumbers, signal },
            async (attempt) => {
                const token = await this.deps.auth.getToken(this.carrier);
                attempt.token = token;
                return this.deps.http.post<unknown>(TRACK_PATH, body, {
                    headers: {
                        'Authorization': `Bearer ${token.bearerValue}`,
                        'X-locale': 'en_US',
                    },
                    signal,
                });
            },
        );

        const byNumber = fedexResultsByNumber(response.data);
        const results = new Map<string, TrackingResult>();
        for (const trackingNumber of trackingNumbers) {
            const raw = byNumber.get(trackingNumber);
            if (raw !== undefined) {
                results.set(trackingNumber, normalize(this.carrier, trackingNumber, raw));
            }
        }
        return results;
    }
}
