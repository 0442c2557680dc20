import { loadConfig } from '../../src/config';
import { TEST_ENV } from '../helpers';

describe('loadConfig', () => {
    it('should apply defaults', () => {
        const config = loadConfig(TEST_ENV);

        expect(config.nodeEnv).toBe('test');
        expect(config.requestTimeoutMs).toBe(30000);
        expect(config.trackingDeadlineMs).toBeUndefined();
        expect(config.tokenRefreshBufferMs).toBe(60000);
        expect(config.retry).toEqual({ maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 30000 });
        expect(config.db).toBeUndefined();
    });

    it('should configure carriers with credentials against their sandboxes', () => {
        const config = loadConfig(TEST_ENV);

        expect(config.fedex).toEqual({
            clientId: 'test-fedex-client',
            clientSecret: 'test-secret',
            sandbox: true,
            baseUrl: 'https://apis-sandbox.fedex.com',
            concurrency: 5,
        });
        expect(config.ups?.baseUrl).toBe('https://wwwcie.ups.com');
        expect(config.ups?.concurrency).toBe(10);
        expect(config.ups?.redirectUri).toBeUndefined();
        expect(config.dhl?.baseUrl).toBe('https://api-sandbox.dhlecs.com');
        expect(config.ontrac).toEqual({
            apiKey: 'test-ontrac-key',
            accountNumber: '37',
            sandbox: true,
            baseUrl: 'https://www.shipontrac.net/OnTracTestWebServices/OnTracServices.svc',
            concurrency: 10,
        });
    });

    it('should leave carriers without credentials unconfigured', () => {
        const config = loadConfig({ FEDEX_CLIENT_ID: 'test-fedex-client', UPS_CLIENT_SECRET: 'test-secret' });

        expect(config.nodeEnv).toBe('development');
        expect(config.fedex).toBeUndefined();
        expect(config.ups).toBeUndefined();
        expect(config.dhl).toBeUndefined();
        expect(config.ontrac).toBeUndefined();
    });

    it('should switch to production URLs and honour overrides', () => {
        const config = loadConfig({
            ...TEST_ENV,
            FEDEX_SANDBOX: 'false',
            ONTRAC_SANDBOX: '0',
            DHL_BASE_URL: 'http://localhost:9090',
            ONTRAC_ACCOUNT_NUMBER: '4412',
        });

        expect(config.fedex?.baseUrl).toBe('https://apis.fedex.com');
        expect(config.ontrac?.baseUrl).toBe('https://www.shipontrac.net/OnTracWebServices/OnTracServices.svc');
        expect(config.ontrac?.accountNumber).toBe('4412');
        expect(config.dhl?.baseUrl).toBe('http://localhost:9090');
    });

    it('should read numeric settings', () => {
        const config = loadConfig({
            ...TEST_ENV,
            TRACKING_DEADLINE_MS: '5000',
            TOKEN_REFRESH_BUFFER_SECONDS: '120',
            FEDEX_CONCURRENCY: '0',
            UPS_REDIRECT_URI: 'https://example.test/callback',
            DATABASE_URL: 'postgres://localhost/tracking_test',
            DB_POOL_MAX: '4',
        });

        expect(config.trackingDeadlineMs).toBe(5000);
        expect(config.tokenRefreshBufferMs).toBe(120000);
        expect(config.fedex?.concurrency).toBe(1);
        expect(config.ups?.redirectUri).toBe('https://example.test/callback');
        expect(config.db).toEqual({ connectionString: 'postgres://localhost/tracking_test', maxConnections: 4 });
    });

    it('should reject malformed integers', () => {
        expect(() => loadConfig({ ...TEST_ENV, REQUEST_TIMEOUT_MS: 'soon' }))
            .toThrow('Environment variable REQUEST_TIMEOUT_MS must be a non-negative integer, got "soon"');
    });
});
