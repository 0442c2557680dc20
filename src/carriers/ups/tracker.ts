import { Carrier, TrackingResult } from '../../domain/models';
import { normalize } from '../normalizer';
import { DEFAULT_PROFILES } from '../profiles';
import { CarrierProfile, CarrierTracker, TrackerDeps } from '../types';

const DETAILS_PATH = '/api/track/v1/details';
const TRANSACTION_SOURCE = 'parcel-tracking';

/**
 * UPS has no batch endpoint; every number is its own request and the batch
 * runner fans them out up to the profile's concurrency.
 */
export class UpsTracker implements CarrierTracker<Carrier.UPS> {
    readonly carrier = Carrier.UPS;
    readonly profile: CarrierProfile;

    constructor(private readonly deps: TrackerDeps) {
        this.profile = deps.profile ?? DEFAULT_PROFILES[Carrier.UPS];
    }

    async fetchChunk(trackingNumbers: readonly string[], signal?: AbortSignal): Promise<Map<string, TrackingResult>> {
        const results = new Map<string, TrackingResult>();
        for (const trackingNumber of trackingNumbers) {
            results.set(trackingNumber, await this.trackOne(trackingNumber, signal));
        }
        return results;
    }

    private async trackOne(trackingNumber: string, signal?: AbortSignal): Promise<TrackingResult> {
        const response = await this.deps.retry.execute(
            { carrier: this.carrier, trackingNumbers: [trackingNumber], signal },
            async (attempt) => {
                const token = await this.deps.auth.getToken(this.carrier);
                attempt.token = token;
                return this.deps.http.get<unknown>(`${DETAILS_PATH}/${encodeURIComponent(trackingNumber)}`, {
                    headers: {
                        'Authorization': `Bearer ${token.bearerValue}`,
                        'transId': newTransactionId(),   // UPS requires a transaction ID per call
                        'transactionSrc': TRANSACTION_SOURCE,
                    },
                    params: {
                        locale: 'en_US',
                        returnSignature: 'false',
                        returnMilestones: 'false',
                        returnPOD: 'false',
                    },
                    signal,
                });
            },
        );
        return normalize(this.carrier, trackingNumber, response.data);
    }
}

function newTransactionId(): string {
    return `${Date.now().toString(36)}${Math.random().toString(36).slice(2, 10)}`;
}
