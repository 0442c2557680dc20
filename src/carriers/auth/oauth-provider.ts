import { z } from 'zod';
import { HttpClient } from '../../http/client';
import { AuthProvider } from '../types';
import { AuthenticationError, CarrierError } from '../../domain/errors';
import { AuthToken, Carrier } from '../../domain/models';

const DEFAULT_REFRESH_BUFFER_MS = 60_000;
const DEFAULT_EXPIRES_IN_SEC = 3600;

const tokenResponseSchema = z.object({
    access_token: z.string().min(1),
    token_type: z.string().optional(),
    expires_in: z.union([z.number(), z.string()]).optional(),
});

export interface OAuthProviderOptions {
    carrier: Carrier;
    tokenUrl: string;
    clientId: string;
    clientSecret: string;
    /**
     * `basic`: credentials in an Authorization header (UPS).
     * `form`: credentials in the form body (FedEx, DHL).
     */
    credentialStyle: 'basic' | 'form';
    refreshBufferMs?: number;
    now?: () => number;
}

/**
 * OAuth2 client-credentials token source for one carrier. Keeps a single
 * cached token and at most one acquisition in flight; concurrent callers
 * share that acquisition.
 */
export class OAuthClientCredentialsProvider implements AuthProvider {
    readonly carrier: Carrier;

    private cachedToken: AuthToken | null = null;
    private pendingRefresh: Promise<AuthToken> | null = null;
    private readonly refreshBufferMs: number;
    private readonly now: () => number;

    constructor(private readonly options: OAuthProviderOptions, private readonly httpClient: HttpClient) {
        this.carrier = options.carrier;
        this.refreshBufferMs = options.refreshBufferMs ?? DEFAULT_REFRESH_BUFFER_MS;
        this.now = options.now ?? Date.now;
    }

    async getToken(): Promise<AuthToken> {
        if (this.cachedToken && this.isTokenValid(this.cachedToken)) {
            return this.cachedToken;
        }
        if (!this.pendingRefresh) {
            this.pendingRefresh = this.fetchNewToken().finally(() => {
                this.pendingRefresh = null;
            });
        }
        return this.pendingRefresh;
    }
    invalidate(rejected?: AuthToken): void {
        // a request that started before the last refresh must not discard the fresh token
        if (rejected && this.cachedToken && this.cachedToken.bearerValue !== rejected.bearerValue) {
            return;
        }
        this.cachedToken = null;
    }

    private isTokenValid(token: AuthToken): boolean {
        return this.now() < token.expiresAt.getTime() - this.refreshBufferMs;
    }

    private buildRequest(): { body: string; headers: Record<string, string> } {
        const { clientId, clientSecret, credentialStyle } = this.options;
        const form = new URLSearchParams({ grant_type: 'client_credentials' });
        const headers: Record<string, string> = {
            'Content-Type': 'application/x-www-form-urlencoded',
        };

        if (credentialStyle === 'basic') {
            const credentials = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');
            headers['Authorization'] = `Basic ${credentials}`;
        } else {
            form.set('client_id', clientId);
            form.set('client_secret', clientSecret);
        }
        return { body: form.toString(), headers };
    }

    private async fetchNewToken(): Promise<AuthToken> {
        const tag = `[${this.carrier}-auth]`;
        try {
            const { body, headers } = this.buildRequest();
            const response = await this.httpClient.post<unknown>(this.options.tokenUrl, body, { headers });

            const parsed = tokenResponseSchema.safeParse(response.data);
            if (!parsed.success) {
                throw new AuthenticationError(
                    this.carrier,
                    'Token response missing access_token field',
                    undefined,
                    { status: response.status, body: response.data },
                );
            }

            const expiresInSec = Number(parsed.data.expires_in);
            if (!Number.isFinite(expiresInSec) || expiresInSec <= 0) {
                console.warn(`${tag} Could not parse expires_in, defaulting to ${DEFAULT_EXPIRES_IN_SEC}s`);
            }
            const lifetimeSec = Number.isFinite(expiresInSec) && expiresInSec > 0 ? expiresInSec : DEFAULT_EXPIRES_IN_SEC;

            const obtainedAt = this.now();
            const token: AuthToken = {
                carrier: this.carrier,
                bearerValue: parsed.data.access_token,
                obtainedAt: new Date(obtainedAt),
                expiresAt: new Date(obtainedAt + lifetimeSec * 1000),
            };
            this.cachedToken = token;
            console.info(`${tag} Obtained access token, valid for ${lifetimeSec}s`);
            return token;

        } catch (err) {
            if (err instanceof AuthenticationError) throw err;
            const upstream = err instanceof CarrierError
                ? { status: err.statusCode, body: err.details }
                : undefined;
            throw new AuthenticationError(
                this.carrier,
                `Failed to obtain access token: ${err instanceof Error ? err.message : 'unknown error'}`,
                err instanceof Error ? err : undefined,
                upstream,
            );
        }
    }
}
