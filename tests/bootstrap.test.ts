import { createTrackingRuntime } from '../src/bootstrap';
import { loadConfig } from '../src/config';
import { Carrier } from '../src/domain/models';
import { TEST_ENV } from './helpers';

describe('createTrackingRuntime', () => {
    it('should register a tracker for every configured carrier', () => {
        const { registry } = createTrackingRuntime(loadConfig(TEST_ENV));

        expect(registry.listCarriers()).toEqual([Carrier.FedEx, Carrier.UPS, Carrier.DHL, Carrier.OnTrac]);
    });

    it('should apply configured concurrency to the tracker profile', () => {
        const { registry } = createTrackingRuntime(loadConfig({ ...TEST_ENV, DHL_CONCURRENCY: '2' }));

        expect(registry.get(Carrier.DHL)?.profile).toEqual({ maxBatchSize: 10, maxPerRequest: 10, concurrency: 2 });
    });

    it('should skip carriers without credentials', () => {
        const { registry } = createTrackingRuntime(loadConfig({
            FEDEX_CLIENT_ID: 'test-fedex-client',
            FEDEX_CLIENT_SECRET: 'test-secret',
        }));

        expect(registry.listCarriers()).toEqual([Carrier.FedEx]);
        expect(registry.has(Carrier.OnTrac)).toBe(false);
    });

    it('should warn that a UPS redirect URI is ignored', () => {
        createTrackingRuntime(loadConfig({ ...TEST_ENV, UPS_REDIRECT_URI: 'https://example.test/callback' }));

        expect(console.warn).toHaveBeenCalledWith(
            '[ups-auth] UPS_REDIRECT_URI is set but only the client-credentials flow is supported; ignoring it',
        );
    });
});
