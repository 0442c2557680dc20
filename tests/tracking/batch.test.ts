import { runTrackerBatch } from '../../src/tracking/batch';
import { DEFAULT_PROFILES } from '../../src/carriers/profiles';
import { AuthenticationError, CarrierBusinessError, TimeoutExceededError, TrackingError, RateLimitError } from '../../src/domain/errors';
import { Carrier, TrackingResult, TrackingStatus } from '../../src/domain/models';
import { createStubTracker, resultFor } from '../helpers';

function fedexNumbers(count: number): string[] {
    return Array.from({ length: count }, (_, i) => String(100000000000 + i));
}

describe('runTrackerBatch', () => {
    it('should return one result per input in input order', async () => {
        const { tracker } = createStubTracker(Carrier.FedEx, DEFAULT_PROFILES[Carrier.FedEx]);
        const numbers = ['123456789012', '987654321098', '111122223333'];

        const results = await runTrackerBatch(tracker, numbers);

        expect(results.map(r => r.trackingNumber)).toEqual(numbers);
        expect(results.every(r => r.status === TrackingStatus.InTransit)).toBe(true);
    });

    it('should split 65 FedEx numbers into requests of 30, 30 and 5', async () => {
        const { tracker, fetchChunk } = createStubTracker(Carrier.FedEx, DEFAULT_PROFILES[Carrier.FedEx]);
        const numbers = fedexNumbers(65);

        const results = await runTrackerBatch(tracker, numbers);

        expect(fetchChunk.mock.calls.map(call => call[0].length)).toEqual([30, 30, 5]);
        expect(fetchChunk.mock.calls[2][0]).toEqual(numbers.slice(60));
        expect(results).toHaveLength(65);
        expect(results[64].trackingNumber).toBe(numbers[64]);
    });

    it('should send one request per number for UPS', async () => {
        const { tracker, fetchChunk } = createStubTracker(Carrier.UPS, DEFAULT_PROFILES[Carrier.UPS]);

        await runTrackerBatch(tracker, ['1Z999AA10123456784', '1Z999AA10123456785']);

        expect(fetchChunk).toHaveBeenCalledTimes(2);
        expect(fetchChunk.mock.calls.map(call => call[0])).toEqual([['1Z999AA10123456784'], ['1Z999AA10123456785']]);
    });

    it('should answer invalid numbers with NOT_FOUND without calling the carrier', async () => {
        const { tracker, fetchChunk } = createStubTracker(Carrier.OnTrac, DEFAULT_PROFILES[Carrier.OnTrac]);

        const [result] = await runTrackerBatch(tracker, ['D10000012345671']);

        expect(fetchChunk).not.toHaveBeenCalled();
        expect(result).toEqual({
            trackingNumber: 'D10000012345671',
            carrier: Carrier.OnTrac,
            status: TrackingStatus.NotFound,
            errorMessage: 'Invalid OnTrac tracking number format: D10000012345671',
            events: [],
            referenceNumbers: [],
        });
    });

    it('should query duplicates once and fill every position', async () => {
        const { tracker, fetchChunk } = createStubTracker(Carrier.FedEx, DEFAULT_PROFILES[Carrier.FedEx]);

        const results = await runTrackerBatch(tracker, ['123456789012', '1234 5678 9012', '987654321098']);

        expect(fetchChunk).toHaveBeenCalledWith(['123456789012', '987654321098'], undefined);
        expect(results.map(r => r.trackingNumber)).toEqual(['123456789012', '123456789012', '987654321098']);
    });

    it('should mark numbers missing from the response as NOT_FOUND', async () => {
        const { tracker } = createStubTracker(Carrier.DHL, DEFAULT_PROFILES[Carrier.DHL], async () =>
            new Map([['GM12345678901234567', resultFor(Carrier.DHL, 'GM12345678901234567')]]));

        const results = await runTrackerBatch(tracker, ['GM12345678901234567', 'GM12345678901234568']);

        expect(results.map(r => r.status)).toEqual([TrackingStatus.InTransit, TrackingStatus.NotFound]);
        expect(results[1].errorMessage).toBe('DHL has no record of tracking number GM12345678901234568');
    });

    it('should isolate a failing chunk from the others', async () => {
        const failure = new TrackingError({
            carrier: 'fedex',
            trackingNumbers: [],
            attempts: 4,
            cause: new RateLimitError('fedex'),
        });
        const { tracker } = createStubTracker(Carrier.FedEx, { maxPerRequest: 1, concurrency: 1 }, async (numbers) => {
            if (numbers[0] === '987654321098') throw failure;
            return new Map(numbers.map(n => [n, resultFor(Carrier.FedEx, n)] as const));
        });

        const results = await runTrackerBatch(tracker, ['123456789012', '987654321098', '111122223333']);

        expect(results.map(r => r.status)).toEqual([TrackingStatus.InTransit, TrackingStatus.Error, TrackingStatus.InTransit]);
        expect(results[1].errorMessage).toBe(failure.message);
    });

    it('should map a carrier not-found response to NOT_FOUND', async () => {
        const { tracker } = createStubTracker(Carrier.UPS, DEFAULT_PROFILES[Carrier.UPS], async () => {
            throw new CarrierBusinessError('ups', 'Tracking number not found: Invalid inquiry number', { notFound: true, statusCode: 404 });
        });

        const [result] = await runTrackerBatch(tracker, ['1Z999AA10123456784']);

        expect(result.status).toBe(TrackingStatus.NotFound);
        expect(result.errorMessage).toBe('Tracking number not found: Invalid inquiry number');
    });

    it('should stop calling the carrier after an authentication failure', async () => {
        const authError = new AuthenticationError('dhl', 'Failed to obtain access token: invalid_client');
        const { tracker, fetchChunk } = createStubTracker(Carrier.DHL, { maxPerRequest: 1, concurrency: 1 }, async () => {
            throw authError;
        });

        const results = await runTrackerBatch(tracker, ['GM12345678901234567', 'GM12345678901234568', 'GM12345678901234569']);

        expect(fetchChunk).toHaveBeenCalledTimes(1);
        results.forEach(result => {
            expect(result.status).toBe(TrackingStatus.Error);
            expect(result.errorMessage).toBe('Failed to obtain access token: invalid_client');
        });
    });

    it('should keep at most profile.concurrency requests in flight', async () => {
        let inFlight = 0;
        let peak = 0;
        const { tracker } = createStubTracker(Carrier.OnTrac, { maxPerRequest: 1, concurrency: 3 }, async (numbers) => {
            inFlight += 1;
            peak = Math.max(peak, inFlight);
            await new Promise(resolve => setTimeout(resolve, 5));
            inFlight -= 1;
            return new Map(numbers.map(n => [n, resultFor(Carrier.OnTrac, n)] as const));
        });

        await runTrackerBatch(tracker, ['D10010000000011', 'D17543558315263', 'D10010000000110', 'C12345678901237', 'D10000012345670']);

        expect(peak).toBe(3);
    });

    it('should report each result through onResult', async () => {
        const { tracker } = createStubTracker(Carrier.FedEx, DEFAULT_PROFILES[Carrier.FedEx]);
        const seen: Array<[number, TrackingResult]> = [];

        await runTrackerBatch(tracker, ['123456789012', 'bogus'], { onResult: (i, r) => seen.push([i, r]) });

        expect(seen.map(([i, r]) => [i, r.status]).sort()).toEqual([
            [0, TrackingStatus.InTransit],
            [1, TrackingStatus.NotFound],
        ]);
    });

    it('should not start chunks once the signal is aborted', async () => {
        const controller = new AbortController();
        controller.abort(new TimeoutExceededError(250));
        const { tracker, fetchChunk } = createStubTracker(Carrier.FedEx, DEFAULT_PROFILES[Carrier.FedEx]);

        const [result] = await runTrackerBatch(tracker, ['123456789012'], { signal: controller.signal });

        expect(fetchChunk).not.toHaveBeenCalled();
        expect(result.status).toBe(TrackingStatus.Error);
        expect(result.errorMessage).toBe('Tracking timed out after 250ms');
    });
});
