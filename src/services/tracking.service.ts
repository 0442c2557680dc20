import { ZodError } from 'zod';
import {
    Carrier,
    CARRIER_LABELS,
    TrackingRequest,
    TrackingResult,
    TrackingStatus,
    ValidationError,
} from '../domain';
import {
    validateTrackingBatch,
    validateTrackingRequest,
    validateTrackingRequestList,
} from '../domain/schemas';
import { canonicalTrackingNumber } from '../carriers/validation';
import { DEFAULT_PROFILES } from '../carriers/profiles';
import { TrackerRegistry } from '../carriers/registry';
import { TrackingOrchestrator, TrackOptions } from '../tracking/orchestrator';
import { AuditEntry, AuditRepository } from '../db/repository';

function generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).substring(2, 8)}`;
}

export interface TrackingNumberCheck {
    trackingNumber: string;
    carrier: Carrier;
    isValid: boolean;
    message: string;
}

export interface TrackingResponse {
    requestId: string;
    results: TrackingResult[];
    requestedAt: Date;
}

export interface CarrierCapability {
    carrier: Carrier;
    name: string;
    /** null when the carrier publishes no per-call limit. */
    maxBatchSize: number | null;
    configured: boolean;
}

interface TrackingServiceDeps {
    orchestrator: TrackingOrchestrator;
    registry: TrackerRegistry;
    auditRepo?: AuditRepository;     // optional, service works without DB
}

type Operation = 'track_single' | 'track_batch' | 'track';

export class TrackingService {
    private orchestrator: TrackingOrchestrator;
    private registry: TrackerRegistry;
    private auditRepo?: AuditRepository;
    private pendingAudits = new Set<Promise<void>>();

    constructor(deps: TrackingServiceDeps) {
        this.orchestrator = deps.orchestrator;
        this.registry = deps.registry;
        this.auditRepo = deps.auditRepo;
    }

    validate(carrier: unknown, trackingNumber: unknown): TrackingNumberCheck {
        const request = parseInput(() => validateTrackingRequest({ carrier, trackingNumber }), 'Invalid tracking number check');
        const canonical = canonicalTrackingNumber(request.trackingNumber);
        const isValid = this.orchestrator.validate(request.carrier, canonical);
        const label = CARRIER_LABELS[request.carrier];

        return {
            trackingNumber: canonical,
            carrier: request.carrier,
            isValid,
            message: isValid
                ? `Valid ${label} tracking number`
                : `Invalid ${label} tracking number format`,
        };
    }

    async trackSingle(carrier: unknown, trackingNumber: unknown, options?: TrackOptions): Promise<TrackingResponse> {
        const request = parseInput(() => validateTrackingRequest({ carrier, trackingNumber }), 'Invalid tracking request');
        return this.run('track_single', [request], options);
    }

    async trackBatch(carrier: unknown, trackingNumbers: unknown, options?: TrackOptions): Promise<TrackingResponse> {
        const batch = parseInput(() => validateTrackingBatch({ carrier, trackingNumbers }), 'Invalid tracking batch');
        const requests = batch.trackingNumbers.map(n => ({ carrier: batch.carrier, trackingNumber: n }));
        this.enforceBatchLimits(requests, 'trackingNumbers');
        return this.run('track_batch', requests, options);
    }

    async track(requests: unknown, options?: TrackOptions): Promise<TrackingResponse> {
        const parsed = parseInput(() => validateTrackingRequestList(requests), 'Invalid tracking requests');
        this.enforceBatchLimits(parsed, 'requests');
        return this.run('track', parsed, options);
    }

    getCarrierCapabilities(): CarrierCapability[] {
        return Object.values(Carrier).map(carrier => ({
            carrier,
            name: CARRIER_LABELS[carrier],
            maxBatchSize: DEFAULT_PROFILES[carrier].maxBatchSize ?? null,
            configured: this.registry.has(carrier),
        }));
    }

    /** Rejects calls that ask one carrier for more numbers than it publishes as its limit. */
    private enforceBatchLimits(requests: readonly TrackingRequest[], field: string): void {
        const counts = new Map<Carrier, number>();
        for (const request of requests) {
            counts.set(request.carrier, (counts.get(request.carrier) ?? 0) + 1);
        }

        const issues: Array<{ field: string; message: string }> = [];
        for (const [carrier, count] of counts) {
            const max = DEFAULT_PROFILES[carrier].maxBatchSize;
            if (max !== undefined && count > max) {
                issues.push({
                    field,
                    message: `${CARRIER_LABELS[carrier]} accepts at most ${max} tracking numbers per call, got ${count}`,
                });
            }
        }
        if (issues.length > 0) {
            throw new ValidationError('Batch size exceeds carrier limit', { issues });
        }
    }

    private async run(operation: Operation, requests: TrackingRequest[], options?: TrackOptions): Promise<TrackingResponse> {
        const requestId = generateRequestId();
        const requestedAt = new Date();
        const start = Date.now();

        const results = await this.orchestrator.track(requests, options);
        this.audit(requestId, operation, results, Date.now() - start);

        return { requestId, results, requestedAt };
    }

    private audit(requestId: string, operation: Operation, results: readonly TrackingResult[], durationMs: number): void {
        const auditRepo = this.auditRepo;
        if (!auditRepo) return;

        const byCarrier = new Map<Carrier, TrackingResult[]>();
        for (const result of results) {
            const group = byCarrier.get(result.carrier);
            if (group) group.push(result);
            else byCarrier.set(result.carrier, [result]);
        }

        for (const [carrier, group] of byCarrier) {
            const write = auditRepo
                .logOperation(summarize(requestId, carrier, operation, group, durationMs))
                .catch(err => console.error('[tracking] Failed to write audit log:', err instanceof Error ? err.message : err))
                .finally(() => this.pendingAudits.delete(write));
            this.pendingAudits.add(write);
        }
    }

    /** Waits for audit writes still in flight, e.g. before closing the pool. */
    async flushAudits(): Promise<void> {
        await Promise.all([...this.pendingAudits]);
    }
}

function summarize(
    requestId: string,
    carrier: Carrier,
    operation: Operation,
    results: readonly TrackingResult[],
    durationMs: number,
): AuditEntry {
    const failures = results.filter(r => r.status === TrackingStatus.Error);
    const status = failures.length === 0
        ? 'success'
        : failures.length === results.length ? 'error' : 'partial';

    return {
        requestId,
        carrier,
        operation,
        status,
        itemCount: results.length,
        durationMs,
        errorCode: failures.length > 0 ? 'TRACKING_FAILED' : undefined,
        errorMsg: failures[0]?.errorMessage,
    };
}

function parseInput<T>(validate: () => T, message: string): T {
    try {
        return validate();
    } catch (err) {
        if (err instanceof ZodError) {
            throw new ValidationError(message, {
                issues: err.issues.map(issue => ({
                    field: issue.path.join('.'),
                    message: issue.message,
                })),
            });
        }
        throw err;
    }
}
