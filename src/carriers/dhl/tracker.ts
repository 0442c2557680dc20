import { Carrier, TrackingResult } from '../../domain/models';
import { normalize } from '../normalizer';
import { DEFAULT_PROFILES } from '../profiles';
import { CarrierProfile, CarrierTracker, TrackerDeps } from '../types';
import { dhlPackagesByNumber } from './mapper';

const PACKAGE_PATH = '/tracking/v4/package/open';

export class DhlTracker implements CarrierTracker<Carrier.DHL> {
    readonly carrier = Carrier.DHL;
    readonly profile: CarrierProfile;

    constructor(private readonly deps: TrackerDeps) {
        this.profile = deps.profile ?? DEFAULT_PROFILES[Carrier.DHL];
    }

    async fetchChunk(trackingNumbers: readonly string[], signal?: AbortSignal): Promise<Map<string, TrackingResult>> {
        const response = await this.deps.retry.execute(
            { carrier: this.carrier, trackingNumbers, signal },
            async (attempt) => {
                const token = await this.deps.auth.getToken(this.carrier);
                attempt.token = token;
                return this.deps.http.get<unknown>(PACKAGE_PATH, {
                    headers: { 'Authorization': `Bearer ${token.bearerValue}` },
                    params: {
                        trackingId: trackingNumbers.join(','),
                        limit: trackingNumbers.length,
                    },
                    signal,
                });
            },
        );

        const byNumber = dhlPackagesByNumber(response.data);
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
