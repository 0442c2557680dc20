import { AppConfig } from './config';
import { Carrier } from './domain/models';
import { HttpClient } from './http/client';
import { CarrierAuthManager } from './carriers/auth/manager';
import { OAuthClientCredentialsProvider } from './carriers/auth/oauth-provider';
import { StaticCredentialProvider } from './carriers/auth/static-provider';
import { DhlTracker } from './carriers/dhl/tracker';
import { FedExTracker } from './carriers/fedex/tracker';
import { OnTracTracker } from './carriers/ontrac/tracker';
import { profileFor } from './carriers/profiles';
import { TrackerRegistry } from './carriers/registry';
import { UpsTracker } from './carriers/ups/tracker';
import { RetryPolicy } from './tracking/retry-policy';
import { TrackingOrchestrator } from './tracking/orchestrator';

export interface TrackingRuntime {
    orchestrator: TrackingOrchestrator;
    registry: TrackerRegistry;
    auth: CarrierAuthManager;
}

/**
 * Wires one tracker per configured carrier. Carriers without credentials
 * are left out of the registry and answer "carrier not configured".
 */
export function createTrackingRuntime(config: AppConfig): TrackingRuntime {
    const timeoutMs = config.requestTimeoutMs;
    const refreshBufferMs = config.tokenRefreshBufferMs;
    const auth = new CarrierAuthManager();
    const registry = new TrackerRegistry();
    const retry = new RetryPolicy({ auth, options: config.retry });

    if (config.fedex) {
        const { baseUrl, clientId, clientSecret, concurrency } = config.fedex;
        auth.register(new OAuthClientCredentialsProvider(
            {
                carrier: Carrier.FedEx,
                tokenUrl: `${baseUrl}/oauth/token`,
                clientId,
                clientSecret,
                credentialStyle: 'form',
                refreshBufferMs,
            },
            new HttpClient('fedex-auth', { timeoutMs }),
        ));
        registry.register(new FedExTracker({
            http: new HttpClient(Carrier.FedEx, { baseURL: baseUrl, timeoutMs }),
            auth,
            retry,
            profile: profileFor(Carrier.FedEx, concurrency),
        }));
    }

    if (config.ups) {
        const { baseUrl, clientId, clientSecret, concurrency, redirectUri } = config.ups;
        if (redirectUri) {
            console.warn('[ups-auth] UPS_REDIRECT_URI is set but only the client-credentials flow is supported; ignoring it');
        }
        auth.register(new OAuthClientCredentialsProvider(
            {
                carrier: Carrier.UPS,
                tokenUrl: `${baseUrl}/security/v1/oauth/token`,
                clientId,
                clientSecret,
                credentialStyle: 'basic',
                refreshBufferMs,
            },
            new HttpClient('ups-auth', { timeoutMs }),
        ));
        registry.register(new UpsTracker({
            http: new HttpClient(Carrier.UPS, { baseURL: baseUrl, timeoutMs }),
            auth,
            retry,
            profile: profileFor(Carrier.UPS, concurrency),
        }));
    }

    if (config.dhl) {
        const { baseUrl, clientId, clientSecret, concurrency } = config.dhl;
        auth.register(new OAuthClientCredentialsProvider(
            {
                carrier: Carrier.DHL,
                tokenUrl: `${baseUrl}/auth/v4/accesstoken`,
                clientId,
                clientSecret,
                credentialStyle: 'form',
                refreshBufferMs,
            },
            new HttpClient('dhl-auth', { timeoutMs }),
        ));
        registry.register(new DhlTracker({
            http: new HttpClient(Carrier.DHL, { baseURL: baseUrl, timeoutMs }),
            auth,
            retry,
            profile: profileFor(Carrier.DHL, concurrency),
        }));
    }

    if (config.ontrac) {
        const { baseUrl, apiKey, accountNumber, concurrency } = config.ontrac;
        auth.register(new StaticCredentialProvider(Carrier.OnTrac, apiKey));
        registry.register(new OnTracTracker({
            http: new HttpClient(Carrier.OnTrac, { baseURL: baseUrl, timeoutMs }),
            auth,
            retry,
            profile: profileFor(Carrier.OnTrac, concurrency),
            accountNumber,
        }));
    }

    const orchestrator = new TrackingOrchestrator(registry, {
        defaultDeadlineMs: config.trackingDeadlineMs,
    });
    return { orchestrator, registry, auth };
}
