import { AuthToken, Carrier } from '../domain/models';
import {
    CarrierError,
    RateLimitError,
    TimeoutExceededError,
    TrackingError,
} from '../domain/errors';
import { Sleep, sleep as defaultSleep } from '../utils/sleep';

export interface RetryOptions {
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitterFactor: number;   // 0-1, e.g. 0.2 = +/-20%
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxRetries: 3,
    baseDelayMs: 1000,
    maxDelayMs: 30_000,
    jitterFactor: 0.2,
};

export interface RetryContext {
    carrier: Carrier;
    trackingNumbers: readonly string[];
    signal?: AbortSignal;
}

/** The slice of CarrierAuthManager the policy needs. */
export interface TokenInvalidator {
    invalidate(carrier: Carrier, rejected?: AuthToken): void;
}

/**
 * Per-attempt scratch space. The operation records the token it sent so a
 * 401 invalidates that token and not one a concurrent caller just obtained.
 */
export interface Attempt {
    token?: AuthToken;
}

interface RetryPolicyDeps {
    auth: TokenInvalidator;
    options?: Partial<RetryOptions>;
    sleep?: Sleep;
    random?: () => number;
}

export class RetryPolicy {
    readonly options: RetryOptions;
    private readonly auth: TokenInvalidator;
    private readonly sleep: Sleep;
    private readonly random: () => number;

    constructor(deps: RetryPolicyDeps) {
        this.auth = deps.auth;
        this.options = { ...DEFAULT_RETRY_OPTIONS, ...deps.options };
        this.sleep = deps.sleep ?? defaultSleep;
        this.random = deps.random ?? Math.random;
    }

    /**
     * Runs `operation` until it succeeds, fails permanently, or runs out of
     * retries. The operation must fetch its token on every call so a forced
     * refresh after a 401 takes effect, and should store it on `attempt`.
     */
    async execute<T>(context: RetryContext, operation: (attempt: Attempt) => Promise<T>): Promise<T> {
        const { carrier, signal } = context;
        let retries = 0;
        let tokenRefreshed = false;

        for (;;) {
            this.throwIfAborted(context);
            const attempt: Attempt = {};
            try {
                return await operation(attempt);
            } catch (err) {
                const error = this.toCarrierError(carrier, err);
                this.throwIfAborted(context);

                if (error.code === 'AUTH_EXPIRED' && !tokenRefreshed) {
                    tokenRefreshed = true;
                    console.warn(`[retry] ${carrier} returned 401, refreshing token and retrying once`);
                    this.auth.invalidate(carrier, attempt.token);
                    continue;
                }
                if (!error.retryable) {
                    throw error;
                }
                if (retries >= this.options.maxRetries) {
                    throw new TrackingError({
                        carrier,
                        trackingNumbers: context.trackingNumbers,
                        attempts: retries + 1,
                        cause: error,
                    });
                }

                const delay = this.delayFor(retries, error);
                retries += 1;
                console.warn(
                    `[retry] ${carrier} ${error.code} (attempt ${retries}/${this.options.maxRetries + 1}), retrying in ${Math.round(delay)}ms`,
                );
                await this.sleep(delay, signal);
            }
        }
    }

    delayFor(attempt: number, error?: CarrierError): number {
        const { baseDelayMs, maxDelayMs, jitterFactor } = this.options;
        const exponential = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);

        const jitterRange = exponential * jitterFactor;
        const jittered = exponential + (this.random() - 0.5) * 2 * jitterRange;

        const retryAfter = error instanceof RateLimitError ? error.retryAfterMs ?? 0 : 0;
        return Math.min(Math.max(0, jittered, retryAfter), maxDelayMs);
    }

    private toCarrierError(carrier: Carrier, err: unknown): CarrierError {
        if (err instanceof CarrierError) return err;
        return new CarrierError({
            message: err instanceof Error ? err.message : String(err),
            code: 'UNKNOWN',
            carrier,
            retryable: false,
            cause: err instanceof Error ? err : undefined,
        });
    }

    private throwIfAborted(context: RetryContext): void {
        if (!context.signal?.aborted) return;
        const reason: unknown = context.signal.reason;
        throw reason instanceof CarrierError ? reason : new TimeoutExceededError(0, context.carrier);
    }
}
