/**
 * Twitch client-credentials token cache (IGDB authenticates through Twitch)
 */
import { ProviderAuthError, ProviderRequestError } from '../fetchers/errors.js';
import { twitchTokenSchema } from '../fetchers/schemas.js';
import type { ProviderClient } from './provider-client.js';

export const TWITCH_TOKEN_URL = 'https://id.twitch.tv/oauth2/token';

// Refresh a minute before Twitch says the token expires
const EXPIRY_MARGIN_SECONDS = 60;

export interface TwitchCredentials {
    clientId: string;
    clientSecret: string;
}

export class TwitchTokenProvider {
    private token: string | null = null;
    private expiresAt = 0;
    private pending: Promise<string> | null = null;

    constructor(
        private readonly client: ProviderClient,
        private readonly credentials: TwitchCredentials,
        private readonly now: () => number = () => Date.now()
    ) { }

    /**
     * Cached token, or a fresh one when missing or about to expire
     */
    async getToken(): Promise<string> {
        if (this.token && this.expiresAt > this.now()) {
            return this.token;
        }
        // Concurrent callers share one exchange
        if (!this.pending) {
            this.pending = this.requestToken().finally(() => {
                this.pending = null;
            });
        }
        return this.pending;
    }

    invalidate(): void {
        this.token = null;
        this.expiresAt = 0;
    }

    private async requestToken(): Promise<string> {
        const data = await this.client.fetchParsed(TWITCH_TOKEN_URL, twitchTokenSchema, 'token response', {
            method: 'POST',
            query: {
                client_id: this.credentials.clientId,
                client_secret: this.credentials.clientSecret,
                grant_type: 'client_credentials',
            },
        }).catch((error: unknown) => {
            // Twitch answers 400 for an unknown client id
            if (error instanceof ProviderRequestError) {
                throw new ProviderAuthError(this.client.provider, `Twitch token exchange rejected: ${error.message}`, {
                    status: error.status,
                    cause: error,
                });
            }
            throw error;
        });

        const lifetime = Math.max(0, data.expires_in - EXPIRY_MARGIN_SECONDS);
        this.token = data.access_token;
        this.expiresAt = this.now() + lifetime * 1000;
        return data.access_token;
    }
}
