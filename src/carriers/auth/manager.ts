import { AuthProvider } from '../types';
import { AuthenticationError } from '../../domain/errors';
import { AuthToken, Carrier } from '../../domain/models';

/**
 * Owns one token source per carrier. Trackers and the retry policy get a
 * reference to this instance; nothing else caches tokens.
 */
export class CarrierAuthManager {
    private providers: Map<Carrier, AuthProvider> = new Map();

    register(provider: AuthProvider): void {
        this.providers.set(provider.carrier, provider);
    }
    has(carrier: Carrier): boolean {
        return this.providers.has(carrier);
    }
    async getToken(carrier: Carrier): Promise<AuthToken> {
        const provider = this.providers.get(carrier);
        if (!provider) {
            throw new AuthenticationError(carrier, `No credentials configured for ${carrier}`);
        }
        return provider.getToken();
    }
    invalidate(carrier: Carrier, rejected?: AuthToken): void {
        this.providers.get(carrier)?.invalidate(rejected);
    }
}
