import { Carrier, TrackingResult } from '../domain/models';
import { normalizeDhl } from './dhl/mapper';
import { normalizeFedEx } from './fedex/mapper';
import { normalizeOnTrac } from './ontrac/mapper';
import { normalizeUps } from './ups/mapper';
import { errorResult } from './result-helpers';

type Normalizer = (trackingNumber: string, raw: unknown) => TrackingResult;

const NORMALIZERS: Record<Carrier, Normalizer> = {
    [Carrier.FedEx]: normalizeFedEx,
    [Carrier.UPS]: normalizeUps,
    [Carrier.DHL]: normalizeDhl,
    [Carrier.OnTrac]: normalizeOnTrac,
};

/**
 * Maps one carrier-native payload onto the canonical result. Never throws:
 * anything unexpected becomes an ERROR result for that tracking number.
 */
export function normalize(carrier: Carrier, trackingNumber: string, raw: unknown): TrackingResult {
    try {
        return NORMALIZERS[carrier](trackingNumber, raw);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        console.error(`[tracking] Failed to normalize ${carrier} result for ${trackingNumber}:`, reason);
        return errorResult(carrier, trackingNumber, `Error parsing tracking data: ${reason}`);
    }
}
