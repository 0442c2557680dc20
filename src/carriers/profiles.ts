import { Carrier } from '../domain/models';
import { CarrierProfile } from './types';

export const DEFAULT_PROFILES: Record<Carrier, CarrierProfile> = {
    [Carrier.FedEx]: { maxBatchSize: 30, maxPerRequest: 30, concurrency: 5 },
    // no batch endpoint: a "batch" is concurrent single-number requests
    [Carrier.UPS]: { maxBatchSize: 10, maxPerRequest: 1, concurrency: 10 },
    [Carrier.DHL]: { maxBatchSize: 10, maxPerRequest: 10, concurrency: 5 },
    [Carrier.OnTrac]: { maxBatchSize: undefined, maxPerRequest: 1, concurrency: 10 },
};

export function profileFor(carrier: Carrier, concurrency?: number): CarrierProfile {
    const base = DEFAULT_PROFILES[carrier];
    return concurrency ? { ...base, concurrency: Math.max(1, concurrency) } : base;
}
