import { fedexResultsByNumber, normalizeFedEx } from '../../src/carriers/fedex/mapper';
import { mapFedExStatus } from '../../src/carriers/fedex/status-codes';
import { Carrier, TrackingStatus } from '../../src/domain/models';
import { ParseError } from '../../src/domain/errors';

import trackFixture from '../fixtures/fedex-track-response.json';

const [deliveredEntry, notFoundEntry] = trackFixture.output.completeTrackResults;

describe('FedEx Mapper', () => {

    describe('fedexResultsByNumber', () => {
        it('should key every entry by its tracking number', () => {
            const byNumber = fedexResultsByNumber(trackFixture);
            expect([...byNumber.keys()]).toEqual(['123456789012', '987654321098']);
            expect(byNumber.get('123456789012')).toEqual(deliveredEntry);
        });

        it('should throw ParseError when the envelope is wrong', () => {
            expect(() => fedexResultsByNumber({ errors: [] })).toThrow(ParseError);
            expect(() => fedexResultsByNumber({})).toThrow('Unexpected FedEx tracking response: output: Required');
            expect(() => fedexResultsByNumber({ output: { completeTrackResults: null } })).toThrow(ParseError);
        });

        it('should skip entries without a tracking number and keep their siblings', () => {
            const byNumber = fedexResultsByNumber({
                output: {
                    completeTrackResults: [
                        { trackResults: [] },
                        notFoundEntry,
                        { trackingNumber: null, trackResults: [] },
                    ],
                },
            });

            expect([...byNumber.keys()]).toEqual(['987654321098']);
            expect(byNumber.get('987654321098')).toBe(notFoundEntry);
            expect(console.warn).toHaveBeenCalledTimes(2);
        });
    });

    describe('normalizeFedEx', () => {
        it('should map a delivered shipment', () => {
            const result = normalizeFedEx('123456789012', deliveredEntry);

            expect(result.carrier).toBe(Carrier.FedEx);
            expect(result.status).toBe(TrackingStatus.Delivered);
            expect(result.deliveredAt).toEqual(new Date('2024-03-14T15:32:00.000Z'));
            expect(result.estimatedDelivery).toBeUndefined();
            expect(result.serviceType).toBe('FedEx Ground');
            expect(result.weight).toEqual({ value: 2.5, unit: 'LB' });
            expect(result.deliveryAddress).toBe('AUSTIN, TX 78701 US');
            expect(result.origin).toEqual({ city: 'MEMPHIS', state: 'TN', country: 'US' });
            expect(result.destination).toEqual({ city: 'AUSTIN', state: 'TX', country: 'US' });
            expect(result.referenceNumbers).toEqual(['PO-1001', 'INV-77']);
            expect(result.errorMessage).toBeUndefined();
        });

        it('should order scan events oldest first', () => {
            const result = normalizeFedEx('123456789012', deliveredEntry);

            expect(result.events.map(e => e.statusCode)).toEqual(['PU', 'AR', 'OD', 'DL']);
            expect(result.events[0]).toEqual({
                timestamp: new Date('2024-03-12T21:05:00.000Z'),
                statusCode: 'PU',
                description: 'Picked up',
                location: { city: 'MEMPHIS', state: 'TN', zip: '38118', country: 'US' },
            });
        });

        it('should report a NOTFOUND error code as NOT_FOUND', () => {
            const result = normalizeFedEx('987654321098', notFoundEntry);

            expect(result.status).toBe(TrackingStatus.NotFound);
            expect(result.errorMessage).toBe(
                'Tracking number cannot be found. Please correct the tracking number and try again.',
            );
            expect(result.events).toEqual([]);
        });

        it('should report other error codes as ERROR', () => {
            const result = normalizeFedEx('123456789012', {
                trackingNumber: '123456789012',
                trackResults: [{ error: { code: 'SYSTEM.UNAVAILABLE.EXCEPTION' } }],
            });

            expect(result.status).toBe(TrackingStatus.Error);
            expect(result.errorMessage).toBe('SYSTEM.UNAVAILABLE.EXCEPTION');
        });

        it('should fall back to the delivery window for the estimate', () => {
            const result = normalizeFedEx('123456789012', {
                trackingNumber: '123456789012',
                trackResults: [{
                    latestStatusDetail: { derivedCode: 'IT' },
                    estimatedDeliveryTimeWindow: { window: { ends: '2024-03-20T20:00:00' } },
                }],
            });

            expect(result.status).toBe(TrackingStatus.InTransit);
            expect(result.estimatedDelivery).toEqual(new Date('2024-03-20T20:00:00.000Z'));
            expect(result.deliveredAt).toBeUndefined();
        });

        it('should take the latest delivery scan when no delivery time is given', () => {
            const result = normalizeFedEx('123456789012', {
                trackingNumber: '123456789012',
                trackResults: [{
                    latestStatusDetail: { code: 'DL', description: 'Delivered' },
                    scanEvents: [
                        { date: '2024-03-15T09:10:00Z', eventType: 'DL', eventDescription: 'Delivered' },
                        { date: '2024-03-14T15:32:00Z', eventType: 'DL', eventDescription: 'Delivered' },
                    ],
                }],
            });

            expect(result.status).toBe(TrackingStatus.Delivered);
            expect(result.deliveredAt).toEqual(new Date('2024-03-15T09:10:00.000Z'));
        });

        it('should return ERROR for a malformed entry', () => {
            const result = normalizeFedEx('123456789012', { trackResults: 'nope' });
            expect(result.status).toBe(TrackingStatus.Error);
            expect(result.errorMessage).toBe('Malformed FedEx tracking data (trackingNumber: Required)');
        });

        it('should return ERROR when there is no track result or status', () => {
            expect(normalizeFedEx('123456789012', { trackingNumber: '123456789012', trackResults: [] }).errorMessage)
                .toBe('No tracking results found');
            expect(normalizeFedEx('123456789012', { trackingNumber: '123456789012', trackResults: [{}] }).errorMessage)
                .toBe('FedEx response missing latestStatusDetail');
        });
    });

    describe('mapFedExStatus', () => {
        it.each([
            ['OC', TrackingStatus.LabelCreated],
            ['pu', TrackingStatus.InTransit],
            ['OD', TrackingStatus.OutForDelivery],
            ['DL', TrackingStatus.Delivered],
            ['DE', TrackingStatus.Exception],
            ['ZZ', TrackingStatus.Unknown],
        ])('should map %s to %s', (code, status) => {
            expect(mapFedExStatus(code)).toBe(status);
        });

        it('should return UNKNOWN without a code', () => {
            expect(mapFedExStatus(undefined)).toBe(TrackingStatus.Unknown);
        });
    });
});
