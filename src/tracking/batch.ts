import { Carrier, TrackingResult } from '../domain/models';
import { AuthenticationError, CarrierBusinessError } from '../domain/errors';
import { canonicalTrackingNumber, validateTrackingNumber } from '../carriers/validation';
import { errorResult, invalidFormatResult, notFoundResult } from '../carriers/result-helpers';
import { CarrierTracker } from '../carriers/types';
import { chunk, mapWithConcurrency } from '../utils/concurrency';

export interface BatchOptions {
    signal?: AbortSignal;
    /** Called once per input position as soon as its result is known. */
    onResult?: (index: number, result: TrackingResult) => void;
}

/**
 * Tracks a list of numbers for one carrier. Invalid numbers are answered
 * locally; valid ones are deduplicated, chunked to the carrier's request
 * size and dispatched with bounded concurrency. The returned array mirrors
 * the input order and never contains a thrown error.
 */
export async function runTrackerBatch(
    tracker: CarrierTracker,
    trackingNumbers: readonly string[],
    options: BatchOptions = {},
): Promise<TrackingResult[]> {
    const { carrier, profile } = tracker;
    const { signal, onResult } = options;
    const results: Array<TrackingResult | undefined> = new Array(trackingNumbers.length).fill(undefined);

    const settle = (index: number, result: TrackingResult) => {
        results[index] = result;
        onResult?.(index, result);
    };

    // canonical number -> every input position that asked for it
    const positions = new Map<string, number[]>();
    trackingNumbers.forEach((candidate, index) => {
        const canonical = canonicalTrackingNumber(candidate);
        if (!validateTrackingNumber(carrier, canonical)) {
            settle(index, invalidFormatResult(carrier, canonical || candidate.trim()));
            return;
        }
        const existing = positions.get(canonical);
        if (existing) existing.push(index);
        else positions.set(canonical, [index]);
    });

    const fill = (trackingNumber: string, result: TrackingResult) => {
        for (const index of positions.get(trackingNumber) ?? []) {
            settle(index, result);
        }
    };

    let authFailure: AuthenticationError | null = null;
    const chunks = chunk([...positions.keys()], profile.maxPerRequest);

    await mapWithConcurrency(chunks, profile.concurrency, async (numbers) => {
        const earlierFailure = authFailure;
        if (earlierFailure) {
            numbers.forEach(n => fill(n, errorResult(carrier, n, earlierFailure.message)));
            return;
        }
        if (signal?.aborted) {
            numbers.forEach(n => fill(n, failureResult(carrier, n, signal.reason)));
            return;
        }

        try {
            const fetched = await tracker.fetchChunk(numbers, signal);
            for (const trackingNumber of numbers) {
                fill(trackingNumber, fetched.get(trackingNumber) ?? notFoundResult(carrier, trackingNumber));
            }
        } catch (err) {
            if (err instanceof AuthenticationError && !authFailure) {
                authFailure = err;
                console.error(`[tracking] ${carrier} authentication failed, skipping remaining requests: ${err.message}`);
            } else {
                console.warn(`[tracking] ${carrier} request for ${numbers.length} number(s) failed: ${describe(err)}`);
            }
            numbers.forEach(n => fill(n, failureResult(carrier, n, err)));
        }
    });

    return results.map((result, index) =>
        result ?? errorResult(carrier, canonicalTrackingNumber(trackingNumbers[index]), 'No result produced'),
    );
}

function failureResult(carrier: Carrier, trackingNumber: string, err: unknown): TrackingResult {
    if (err instanceof CarrierBusinessError && err.notFound) {
        return notFoundResult(carrier, trackingNumber, err.message);
    }
    return errorResult(carrier, trackingNumber, describe(err));
}

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
