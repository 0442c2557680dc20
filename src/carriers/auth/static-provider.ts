import { AuthProvider } from '../types';
import { AuthToken, Carrier } from '../../domain/models';

const NEVER = new Date(8.64e15);

/**
 * OnTrac has no token endpoint: its API password rides along as a query
 * parameter on every call. Wrapping it as a never-expiring token keeps the
 * tracker side uniform.
 */
export class StaticCredentialProvider implements AuthProvider {
    private readonly token: AuthToken;

    constructor(readonly carrier: Carrier, apiKey: string) {
        this.token = {
            carrier,
            bearerValue: apiKey,
            obtainedAt: new Date(),
            expiresAt: NEVER,
        };
    }

    async getToken(): Promise<AuthToken> {
        return this.token;
    }
    invalidate(): void { }
}
