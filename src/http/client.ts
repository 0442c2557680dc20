import axios, {
    AxiosInstance,
    AxiosRequestConfig,
    AxiosResponse,
} from 'axios';
import {
    CarrierError,
    CarrierBusinessError,
    TransientNetworkError,
    TimeoutError,
    RateLimitError,
} from '../domain/errors';
import { isRecord } from '../utils/guards';

export interface HttpClientOptions {
    baseURL?: string;
    timeoutMs: number;
    defaultHeaders?: Record<string, string>;
}

export interface HttpResponse<T = unknown> {
    status: number;
    data: T;
    headers: Record<string, string>;
}

export type HttpRequestConfig = Pick<AxiosRequestConfig, 'headers' | 'params' | 'signal' | 'responseType'>;

export class HttpClient {
    private client: AxiosInstance;
    private carrier: string;

    constructor(carrier: string, options: HttpClientOptions) {
        this.carrier = carrier;
        this.client = axios.create({
            baseURL: options.baseURL,
            timeout: options.timeoutMs,
            headers: {
                'Content-Type': 'application/json',
                ...options.defaultHeaders,
            },
        });
    }

    async post<T>(url: string, data?: unknown, config?: HttpRequestConfig): Promise<HttpResponse<T>> {
        try {
            const response: AxiosResponse<T> = await this.client.post(url, data, config);
            return this.wrapResponse(response);
        } catch (err) {
            throw this.handleError(err);
        }
    }

    async get<T>(url: string, config?: HttpRequestConfig): Promise<HttpResponse<T>> {
        try {
            const response: AxiosResponse<T> = await this.client.get(url, config);
            return this.wrapResponse(response);
        } catch (err) {
            throw this.handleError(err);
        }
    }

    private wrapResponse<T>(response: AxiosResponse<T>): HttpResponse<T> {
        const headers: Record<string, string> = {};
        for (const [key, value] of Object.entries(response.headers ?? {})) {
            if (typeof value === 'string' || typeof value === 'number') {
                headers[key.toLowerCase()] = String(value);
            }
        }
        return {
            status: response.status,
            data: response.data,
            headers,
        };
    }
    private handleError(err: unknown): CarrierError {
        if (axios.isCancel(err)) {
            return new CarrierError({
                message: `Request to ${this.carrier} was aborted`,
                code: 'DEADLINE_EXCEEDED',
                carrier: this.carrier,
                retryable: false,
            });
        }
        if (!axios.isAxiosError(err)) {
            return new TransientNetworkError(
                this.carrier,
                `Unexpected error: ${err instanceof Error ? err.message : 'unknown'}`,
                err instanceof Error ? err : undefined,
            );
        }

        if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
            return new TimeoutError(this.carrier, this.client.defaults.timeout ?? 0);
        }
        if (!err.response) {
            return new TransientNetworkError(
                this.carrier,
                `Network error: ${err.message}`,
                err,
            );
        }

        const { status, data } = err.response;
        const details = isRecord(data) ? data : { raw: data };
        if (status === 429) {
            const retryAfter = Number(err.response.headers?.['retry-after']);
            const retryMs = Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter * 1000 : undefined;
            return new RateLimitError(this.carrier, retryMs);
        }
        if (status === 401) {
            // the token was rejected by the API itself; RetryPolicy refreshes it once
            return new CarrierError({
                message: `${this.carrier} rejected the access token (HTTP 401): ${extractErrorMessage(data)}`,
                code: 'AUTH_EXPIRED',
                carrier: this.carrier,
                statusCode: 401,
                retryable: false,
                details,
            });
        }
        if (status === 404) {
            return new CarrierBusinessError(
                this.carrier,
                `Tracking number not found: ${extractErrorMessage(data)}`,
                { notFound: true, statusCode: 404, details },
            );
        }
        return new CarrierError({
            message: `${this.carrier} API error (HTTP ${status}): ${extractErrorMessage(data)}`,
            code: 'CARRIER_API_ERROR',
            carrier: this.carrier,
            statusCode: status,
            retryable: status >= 500,
            details,
        });
    }
}

/**
 * Pulls a human-readable message out of the error bodies the four carriers
 * (and their OAuth endpoints) send back.
 */
export function extractErrorMessage(data: unknown): string {
    if (typeof data === 'string') return data.trim().slice(0, 200) || 'Unknown error';
    if (!isRecord(data)) return 'Unknown error';

    // UPS: { response: { errors: [{ code, message }] } }
    if (isRecord(data.response) && Array.isArray(data.response.errors)) {
        const first: unknown = data.response.errors[0];
        if (isRecord(first)) return String(first.message ?? first.code ?? 'Unknown error');
    }
    // FedEx: { errors: [{ code, message }] }
    if (Array.isArray(data.errors)) {
        const first: unknown = data.errors[0];
        if (isRecord(first)) return String(first.message ?? first.code ?? 'Unknown error');
    }
    // DHL problem+json: { title, detail }
    if (typeof data.detail === 'string') return data.detail;
    if (typeof data.title === 'string') return data.title;
    if (typeof data.error_description === 'string') return data.error_description;
    if (data.message) return String(data.message);
    if (typeof data.error === 'string') return data.error;
    return 'Unknown error';
}
