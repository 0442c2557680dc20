import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export interface OAuthCarrierConfig {
    clientId: string;
    clientSecret: string;
    sandbox: boolean;
    baseUrl: string;
    concurrency: number;
}

export interface UpsConfig extends OAuthCarrierConfig {
    redirectUri?: string;    // authorization-code flow is not supported; kept so we can warn about it
}

export interface OnTracConfig {
    apiKey: string;
    accountNumber: string;
    sandbox: boolean;
    baseUrl: string;
    concurrency: number;
}

export interface RetryConfig {
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

export interface DbConfig {
    connectionString: string;
    maxConnections: number;
}

export interface AppConfig {
    nodeEnv: string;
    requestTimeoutMs: number;
    trackingDeadlineMs?: number;
    tokenRefreshBufferMs: number;
    retry: RetryConfig;
    fedex?: OAuthCarrierConfig;
    ups?: UpsConfig;
    dhl?: OAuthCarrierConfig;
    ontrac?: OnTracConfig;
    db?: DbConfig;
}

const BASE_URLS = {
    fedex: { sandbox: 'https://apis-sandbox.fedex.com', production: 'https://apis.fedex.com' },
    ups: { sandbox: 'https://wwwcie.ups.com', production: 'https://onlinetools.ups.com' },
    dhl: { sandbox: 'https://api-sandbox.dhlecs.com', production: 'https://api.dhlecs.com' },
    ontrac: {
        sandbox: 'https://www.shipontrac.net/OnTracTestWebServices/OnTracServices.svc',
        production: 'https://www.shipontrac.net/OnTracWebServices/OnTracServices.svc',
    },
} as const;

type Env = Record<string, string | undefined>;

function readEnv(env: Env, key: string, fallback?: string): string {
    const val = env[key] ?? fallback;
    if (val === undefined) {
        throw new Error(
            `Missing required environment variable: ${key}. ` +
            `Check your .env file or environment.`
        );
    }
    return val;
}
function readOptional(env: Env, key: string): string | undefined {
    const val = env[key]?.trim();
    return val ? val : undefined;
}
function readInt(env: Env, key: string, fallback: number): number {
    const raw = readEnv(env, key, String(fallback));
    const parsed = parseInt(raw, 10);
    if (isNaN(parsed) || parsed < 0) {
        throw new Error(`Environment variable ${key} must be a non-negative integer, got "${raw}"`);
    }
    return parsed;
}
function readBool(env: Env, key: string, fallback: boolean): boolean {
    const raw = readOptional(env, key);
    if (raw === undefined) return fallback;
    return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

function readOAuthCarrier(
    env: Env,
    prefix: 'FEDEX' | 'UPS' | 'DHL',
    urls: { sandbox: string; production: string },
    defaultConcurrency: number,
): OAuthCarrierConfig | undefined {
    const clientId = readOptional(env, `${prefix}_CLIENT_ID`);
    const clientSecret = readOptional(env, `${prefix}_CLIENT_SECRET`);
    if (!clientId || !clientSecret) return undefined;

    const sandbox = readBool(env, `${prefix}_SANDBOX`, true);
    return {
        clientId,
        clientSecret,
        sandbox,
        baseUrl: readOptional(env, `${prefix}_BASE_URL`) ?? (sandbox ? urls.sandbox : urls.production),
        concurrency: Math.max(1, readInt(env, `${prefix}_CONCURRENCY`, defaultConcurrency)),
    };
}

/**
 * Carriers without credentials are left undefined and simply not registered.
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const ups = readOAuthCarrier(env, 'UPS', BASE_URLS.ups, 10);
    const ontracKey = readOptional(env, 'ONTRAC_API_KEY');
    const ontracSandbox = readBool(env, 'ONTRAC_SANDBOX', true);
    const deadline = readOptional(env, 'TRACKING_DEADLINE_MS');
    const databaseUrl = readOptional(env, 'DATABASE_URL');

    return {
        nodeEnv: readEnv(env, 'NODE_ENV', 'development'),
        requestTimeoutMs: readInt(env, 'REQUEST_TIMEOUT_MS', 30_000),
        trackingDeadlineMs: deadline ? readInt(env, 'TRACKING_DEADLINE_MS', 0) : undefined,
        tokenRefreshBufferMs: readInt(env, 'TOKEN_REFRESH_BUFFER_SECONDS', 60) * 1000,
        retry: {
            maxRetries: readInt(env, 'RETRY_MAX_RETRIES', 3),
            baseDelayMs: readInt(env, 'RETRY_BASE_DELAY_MS', 1000),
            maxDelayMs: readInt(env, 'RETRY_MAX_DELAY_MS', 30_000),
        },
        fedex: readOAuthCarrier(env, 'FEDEX', BASE_URLS.fedex, 5),
        ups: ups ? { ...ups, redirectUri: readOptional(env, 'UPS_REDIRECT_URI') } : undefined,
        dhl: readOAuthCarrier(env, 'DHL', BASE_URLS.dhl, 5),
        ontrac: ontracKey
            ? {
                apiKey: ontracKey,
                accountNumber: readEnv(env, 'ONTRAC_ACCOUNT_NUMBER', '37'),
                sandbox: ontracSandbox,
                baseUrl: readOptional(env, 'ONTRAC_BASE_URL')
                    ?? (ontracSandbox ? BASE_URLS.ontrac.sandbox : BASE_URLS.ontrac.production),
                concurrency: Math.max(1, readInt(env, 'ONTRAC_CONCURRENCY', 10)),
            }
            : undefined,
        db: databaseUrl
            ? { connectionString: databaseUrl, maxConnections: Math.max(1, readInt(env, 'DB_POOL_MAX', 10)) }
            : undefined,
    };
}
