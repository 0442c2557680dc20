import { TrackingOrchestrator } from '../../src/tracking/orchestrator';
import { TrackerRegistry } from '../../src/carriers/registry';
import { DEFAULT_PROFILES } from '../../src/carriers/profiles';
import { AuthenticationError } from '../../src/domain/errors';
import { Carrier, TrackingStatus } from '../../src/domain/models';
import { createStubTracker, resultFor } from '../helpers';

describe('TrackingOrchestrator', () => {
    let registry: TrackerRegistry;

    beforeEach(() => {
        registry = new TrackerRegistry();
    });

    it('should re-interleave mixed-carrier results in input order', async () => {
        const fedex = createStubTracker(Carrier.FedEx, DEFAULT_PROFILES[Carrier.FedEx]);
        const ups = createStubTracker(Carrier.UPS, DEFAULT_PROFILES[Carrier.UPS]);
        registry.register(fedex.tracker);
        registry.register(ups.tracker);
        const orchestrator = new TrackingOrchestrator(registry);

        const results = await orchestrator.track([
            { carrier: Carrier.UPS, trackingNumber: '1Z999AA10123456784' },
            { carrier: Carrier.FedEx, trackingNumber: '123456789012' },
            { carrier: Carrier.UPS, trackingNumber: '1Z999AA10123456785' },
        ]);

        expect(results.map(r => [r.carrier, r.trackingNumber])).toEqual([
            [Carrier.UPS, '1Z999AA10123456784'],
            [Carrier.FedEx, '123456789012'],
            [Carrier.UPS, '1Z999AA10123456785'],
        ]);
        expect(fedex.fetchChunk).toHaveBeenCalledTimes(1);
        expect(ups.fetchChunk).toHaveBeenCalledTimes(2);
    });

    it('should answer carriers without a tracker with ERROR', async () => {
        const orchestrator = new TrackingOrchestrator(registry);

        const result = await orchestrator.trackSingle(Carrier.DHL, 'GM12345678901234567');

        expect(result.status).toBe(TrackingStatus.Error);
        expect(result.errorMessage).toBe('DHL carrier not configured');
    });

    it('should keep other carriers working when one fails authentication', async () => {
        const dhl = createStubTracker(Carrier.DHL, DEFAULT_PROFILES[Carrier.DHL], async () => {
            throw new AuthenticationError('dhl', 'Failed to obtain access token: invalid_client');
        });
        registry.register(dhl.tracker);
        registry.register(createStubTracker(Carrier.FedEx, DEFAULT_PROFILES[Carrier.FedEx]).tracker);
        const orchestrator = new TrackingOrchestrator(registry);

        const results = await orchestrator.track([
            { carrier: Carrier.DHL, trackingNumber: 'GM12345678901234567' },
            { carrier: Carrier.FedEx, trackingNumber: '123456789012' },
        ]);

        expect(results.map(r => r.status)).toEqual([TrackingStatus.Error, TrackingStatus.InTransit]);
    });

    it('should return partial results when the deadline passes', async () => {
        const slow = createStubTracker(Carrier.UPS, DEFAULT_PROFILES[Carrier.UPS], (numbers, signal) =>
            new Promise((_resolve, reject) => {
                signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
            }));
        registry.register(slow.tracker);
        registry.register(createStubTracker(Carrier.FedEx, DEFAULT_PROFILES[Carrier.FedEx]).tracker);
        const orchestrator = new TrackingOrchestrator(registry);

        const results = await orchestrator.track(
            [
                { carrier: Carrier.FedEx, trackingNumber: '123456789012' },
                { carrier: Carrier.UPS, trackingNumber: '1Z999AA10123456784' },
            ],
            { deadlineMs: 50 },
        );

        expect(results[0].status).toBe(TrackingStatus.InTransit);
        expect(results[1]).toMatchObject({
            trackingNumber: '1Z999AA10123456784',
            status: TrackingStatus.Error,
            errorMessage: 'Tracking timed out after 50ms',
        });
        expect(slow.fetchChunk.mock.calls[0][1]?.aborted).toBe(true);
    });

    it('should use the default deadline when none is given', async () => {
        registry.register(createStubTracker(Carrier.FedEx, DEFAULT_PROFILES[Carrier.FedEx], () => new Promise(() => { })).tracker);
        const orchestrator = new TrackingOrchestrator(registry, { defaultDeadlineMs: 20 });

        const result = await orchestrator.trackSingle(Carrier.FedEx, '123456789012');

        expect(result.errorMessage).toBe('Tracking timed out after 20ms');
    });

    it('should track a batch for one carrier', async () => {
        registry.register(createStubTracker(Carrier.FedEx, DEFAULT_PROFILES[Carrier.FedEx], async (numbers) =>
            new Map(numbers.map(n => [n, resultFor(Carrier.FedEx, n, TrackingStatus.Delivered)] as const))).tracker);
        const orchestrator = new TrackingOrchestrator(registry);

        const results = await orchestrator.trackBatch(Carrier.FedEx, ['123456789012', '12345']);

        expect(results.map(r => r.status)).toEqual([TrackingStatus.Delivered, TrackingStatus.NotFound]);
    });

    it('should validate without network access', () => {
        const orchestrator = new TrackingOrchestrator(registry);
        expect(orchestrator.validate(Carrier.OnTrac, 'D10010000000011')).toBe(true);
        expect(orchestrator.validate(Carrier.OnTrac, 'D10010000000012')).toBe(false);
    });
});
