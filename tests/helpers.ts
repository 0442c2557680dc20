import { AuthToken, Carrier, TrackingResult, TrackingStatus } from '../src/domain/models';
import { HttpResponse } from '../src/http/client';
import { RetryOptions, RetryPolicy, TokenInvalidator } from '../src/tracking/retry-policy';
import { CarrierProfile, CarrierTracker } from '../src/carriers/types';

export const TEST_OAUTH_CONFIG = {
    clientId: 'test-client',
    clientSecret: 'test-secret',
};

export const TEST_ENV: Record<string, string> = {
    NODE_ENV: 'test',
    FEDEX_CLIENT_ID: 'test-fedex-client',
    FEDEX_CLIENT_SECRET: 'test-secret',
    UPS_CLIENT_ID: 'test-ups-client',
    UPS_CLIENT_SECRET: 'test-secret',
    DHL_CLIENT_ID: 'test-dhl-client',
    DHL_CLIENT_SECRET: 'test-secret',
    ONTRAC_API_KEY: 'test-ontrac-key',
};

export function testToken(carrier: Carrier, bearerValue = `test-${carrier}-token`): AuthToken {
    return {
        carrier,
        bearerValue,
        obtainedAt: new Date(0),
        expiresAt: new Date(3_600_000),
    };
}

export function createTokenSource() {
    return {
        getToken: jest.fn((carrier: Carrier) => Promise.resolve(testToken(carrier))),
        invalidate: jest.fn(),
    };
}

/** Retry policy with no real waiting and no jitter. */
export function createRetryPolicy(
    auth: TokenInvalidator = { invalidate: jest.fn() },
    options: Partial<RetryOptions> = {},
) {
    const sleep = jest.fn((_ms: number, _signal?: AbortSignal) => Promise.resolve());
    const policy = new RetryPolicy({
        auth,
        options: { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 1000, jitterFactor: 0.2, ...options },
        sleep,
        random: () => 0.5,
    });
    return { policy, sleep };
}

export function okResponse<T>(data: T): HttpResponse<T> {
    return { status: 200, data, headers: {} };
}

export function resultFor(carrier: Carrier, trackingNumber: string, status = TrackingStatus.InTransit): TrackingResult {
    return { trackingNumber, carrier, status, events: [], referenceNumbers: [] };
}

type FetchChunk = CarrierTracker['fetchChunk'];

/**
 * Tracker double that answers every number with IN_TRANSIT unless the
 * supplied implementation says otherwise.
 */
export function createStubTracker(
    carrier: Carrier,
    profile: CarrierProfile,
    impl?: FetchChunk,
) {
    const answerAll: FetchChunk = (numbers) =>
        Promise.resolve(new Map(numbers.map(n => [n, resultFor(carrier, n)] as const)));
    const fetchChunk = jest.fn<ReturnType<FetchChunk>, Parameters<FetchChunk>>(impl ?? answerAll);
    const tracker: CarrierTracker = { carrier, profile, fetchChunk };
    return { tracker, fetchChunk };
}
