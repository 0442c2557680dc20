import { Carrier, CARRIER_LABELS, TrackingRequest, TrackingResult } from '../domain/models';
import { TimeoutExceededError } from '../domain/errors';
import { TrackerRegistry } from '../carriers/registry';
import { canonicalTrackingNumber, validateTrackingNumber } from '../carriers/validation';
import { errorResult } from '../carriers/result-helpers';
import { runTrackerBatch } from './batch';

export interface TrackOptions {
    /** Whole-call deadline; falls back to the orchestrator default. */
    deadlineMs?: number;
    onResult?: (index: number, result: TrackingResult) => void;
}

export interface OrchestratorOptions {
    defaultDeadlineMs?: number;
}

export class TrackingOrchestrator {
    constructor(
        private readonly registry: TrackerRegistry,
        private readonly options: OrchestratorOptions = {},
    ) { }

    validate(carrier: Carrier, trackingNumber: string): boolean {
        return validateTrackingNumber(carrier, trackingNumber);
    }

    async trackSingle(carrier: Carrier, trackingNumber: string, options: TrackOptions = {}): Promise<TrackingResult> {
        const [result] = await this.track([{ carrier, trackingNumber }], options);
        return result;
    }

    async trackBatch(carrier: Carrier, trackingNumbers: readonly string[], options: TrackOptions = {}): Promise<TrackingResult[]> {
        return this.track(trackingNumbers.map(trackingNumber => ({ carrier, trackingNumber })), options);
    }

    /**
     * Tracks a mixed list. Carriers run concurrently; results come back in
     * input order. When the deadline passes, in-flight calls are aborted and
     * every slot still open gets a timeout ERROR.
     */
    async track(requests: readonly TrackingRequest[], options: TrackOptions = {}): Promise<TrackingResult[]> {
        const deadlineMs = options.deadlineMs ?? this.options.defaultDeadlineMs;
        const results: Array<TrackingResult | undefined> = new Array(requests.length).fill(undefined);
        const controller = new AbortController();

        const groups = new Map<Carrier, number[]>();
        requests.forEach((request, index) => {
            const indexes = groups.get(request.carrier);
            if (indexes) indexes.push(index);
            else groups.set(request.carrier, [index]);
        });

        const record = (index: number, result: TrackingResult) => {
            // late arrivals after the deadline are dropped
            if (controller.signal.aborted) return;
            results[index] = result;
            options.onResult?.(index, result);
        };

        const work = Promise.all([...groups].map(([carrier, indexes]) =>
            this.runGroup(carrier, indexes, requests, controller.signal, record),
        ));

        let timedOut = false;
        if (deadlineMs && deadlineMs > 0) {
            let timer: NodeJS.Timeout | undefined;
            const deadline = new Promise<'timeout'>(resolve => {
                timer = setTimeout(() => resolve('timeout'), deadlineMs);
            });
            try {
                const outcome = await Promise.race([work.then(() => 'done' as const), deadline]);
                if (outcome === 'timeout') {
                    timedOut = true;
                    controller.abort(new TimeoutExceededError(deadlineMs));
                    console.warn(`[tracking] Deadline of ${deadlineMs}ms reached, returning partial results`);
                }
            } finally {
                clearTimeout(timer);
            }
        } else {
            await work;
        }

        const timeoutMessage = new TimeoutExceededError(deadlineMs ?? 0).message;
        return results.map((result, index) => {
            if (result) return result;
            const request = requests[index];
            return errorResult(
                request.carrier,
                canonicalTrackingNumber(request.trackingNumber),
                timedOut ? timeoutMessage : 'No result produced',
            );
        });
    }

    private async runGroup(
        carrier: Carrier,
        indexes: number[],
        requests: readonly TrackingRequest[],
        signal: AbortSignal,
        record: (index: number, result: TrackingResult) => void,
    ): Promise<void> {
        const tracker = this.registry.get(carrier);
        if (!tracker) {
            for (const index of indexes) {
                const trackingNumber = canonicalTrackingNumber(requests[index].trackingNumber);
                record(index, errorResult(carrier, trackingNumber, `${CARRIER_LABELS[carrier]} carrier not configured`));
            }
            return;
        }

        await runTrackerBatch(tracker, indexes.map(i => requests[i].trackingNumber), {
            signal,
            onResult: (local, result) => record(indexes[local], result),
        });
    }
}
