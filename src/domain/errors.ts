export type ErrorCode =
    | 'VALIDATION_ERROR'
    | 'AUTH_FAILED'
    | 'AUTH_EXPIRED'
    | 'RATE_LIMITED'
    | 'CARRIER_API_ERROR'
    | 'CARRIER_BUSINESS_ERROR'
    | 'NETWORK_ERROR'
    | 'TIMEOUT'
    | 'DEADLINE_EXCEEDED'
    | 'RETRIES_EXHAUSTED'
    | 'PARSE_ERROR'
    | 'CARRIER_NOT_FOUND'
    | 'UNKNOWN';
export class CarrierError extends Error {
    public readonly code: ErrorCode;
    public readonly carrier: string;
    public readonly retryable: boolean;
    public readonly statusCode?: number;
    public readonly details?: Record<string, unknown>;

    constructor(opts: {
        message: string;
        code: ErrorCode;
        carrier?: string;
        retryable?: boolean;
        statusCode?: number;
        details?: Record<string, unknown>;
        cause?: Error;
    }) {
        super(opts.message);
        this.name = 'CarrierError';
        this.code = opts.code;
        this.carrier = opts.carrier ?? 'unknown';
        this.retryable = opts.retryable ?? false;
        this.statusCode = opts.statusCode;
        this.details = opts.details;
        if (opts.cause) {
            this.cause = opts.cause;
        }
    }
    toJSON() {
        return {
            error: {
                code: this.code,
                message: this.message,
                carrier: this.carrier,
                retryable: this.retryable,
                ...(this.statusCode ? { statusCode: this.statusCode } : {}),
                ...(this.details ? { details: this.details } : {}),
            },
        };
    }
}

/**
 * The carrier rejected our credentials (or we could not reach its token
 * endpoint). Fatal for that carrier until the credentials change.
 */
export class AuthenticationError extends CarrierError {
    public readonly upstreamStatus?: number;
    public readonly upstreamBody?: unknown;

    constructor(
        carrier: string,
        message: string,
        cause?: Error,
        upstream?: { status?: number; body?: unknown },
    ) {
        super({
            message,
            code: 'AUTH_FAILED',
            carrier,
            retryable: false,
            statusCode: upstream?.status,
            cause,
        });
        this.name = 'AuthenticationError';
        this.upstreamStatus = upstream?.status;
        this.upstreamBody = upstream?.body;
    }
}

export class RateLimitError extends CarrierError {
    public readonly retryAfterMs?: number;

    constructor(carrier: string, retryAfterMs?: number) {
        super({
            message: `Rate limited by ${carrier}. ${retryAfterMs ? `Retry after ${retryAfterMs}ms` : 'Try again later.'}`,
            code: 'RATE_LIMITED',
            carrier,
            retryable: true,
            statusCode: 429,
        });
        this.name = 'RateLimitError';
        this.retryAfterMs = retryAfterMs;
    }
}

export class TransientNetworkError extends CarrierError {
    constructor(carrier: string, message: string, cause?: Error) {
        super({
            message,
            code: 'NETWORK_ERROR',
            carrier,
            retryable: true,
            cause,
        });
        this.name = 'TransientNetworkError';
    }
}

export class TimeoutError extends CarrierError {
    constructor(carrier: string, timeoutMs: number) {
        super({
            message: `Request to ${carrier} timed out after ${timeoutMs}ms`,
            code: 'TIMEOUT',
            carrier,
            retryable: true,
        });
        this.name = 'TimeoutError';
    }
}

/**
 * A well-formed "no" from the carrier: unknown tracking number, invalid
 * request data. Never retried; ends up on the result, not thrown to callers.
 */
export class CarrierBusinessError extends CarrierError {
    public readonly notFound: boolean;

    constructor(carrier: string, message: string, opts: { notFound: boolean; statusCode?: number; details?: Record<string, unknown> }) {
        super({
            message,
            code: 'CARRIER_BUSINESS_ERROR',
            carrier,
            retryable: false,
            statusCode: opts.statusCode,
            details: opts.details,
        });
        this.name = 'CarrierBusinessError';
        this.notFound = opts.notFound;
    }
}

export class TimeoutExceededError extends CarrierError {
    constructor(deadlineMs: number, carrier?: string) {
        super({
            message: `Tracking timed out after ${deadlineMs}ms`,
            code: 'DEADLINE_EXCEEDED',
            carrier,
            retryable: false,
        });
        this.name = 'TimeoutExceededError';
    }
}

export class TrackingError extends CarrierError {
    public readonly trackingNumbers: readonly string[];
    public readonly attempts: number;

    constructor(opts: { carrier: string; trackingNumbers: readonly string[]; attempts: number; cause: CarrierError }) {
        super({
            message: `${opts.carrier} request failed after ${opts.attempts} attempts: ${opts.cause.message}`,
            code: 'RETRIES_EXHAUSTED',
            carrier: opts.carrier,
            retryable: false,
            statusCode: opts.cause.statusCode,
            details: { trackingNumbers: [...opts.trackingNumbers], lastErrorCode: opts.cause.code },
            cause: opts.cause,
        });
        this.name = 'TrackingError';
        this.trackingNumbers = opts.trackingNumbers;
        this.attempts = opts.attempts;
    }
}

export class ValidationError extends CarrierError {
    constructor(message: string, details?: Record<string, unknown>) {
        super({
            message,
            code: 'VALIDATION_ERROR',
            retryable: false,
            details,
        });
        this.name = 'ValidationError';
    }
}

export class ParseError extends CarrierError {
    constructor(carrier: string, message: string, cause?: Error) {
        super({
            message,
            code: 'PARSE_ERROR',
            carrier,
            retryable: false,
            cause,
        });
        this.name = 'ParseError';
    }
}
