/**
 * Authentication Service
 * Exchanges email/password for a refresh token, and the refresh token for access tokens.
 */

import type { MacroFactorClient } from '../api/client.js';
import type { Session } from '../api/types.js';
import { NotLoggedInError } from '../errors.js';
import type { ConfigStore, LoadResult } from './config-store.service.js';

// Buffer time before token expiration (5 minutes)
const TOKEN_REFRESH_BUFFER_MS = 5 * 60 * 1000;

export class AuthService {
  private session: Session | null = null;

  constructor(
    private readonly client: MacroFactorClient,
    private readonly store: ConfigStore,
    private state: LoadResult
  ) {}

  /**
   * Sign in and persist the refresh token. Any cached search is dropped.
   */
  async login(email: string, password: string): Promise<void> {
    const response = await this.client.signInWithPassword(email, password);
    const config = { refreshToken: response.refreshToken };
    this.store.save(config);
    this.state = { status: 'configured', config };
    this.session = null;
  }

  /**
   * Get a valid access token and user id.
   * Fails before any network call when no refresh token is stored.
   */
  async getSession(now: number = Date.now()): Promise<Session> {
    if (this.session && this.session.expiresAt > now + TOKEN_REFRESH_BUFFER_MS) {
      return this.session;
    }

    if (this.state.status !== 'configured') {
      throw new NotLoggedInError();
    }

    const stored = this.state.config.refreshToken;
    const response = await this.client.refreshToken(stored);

    if (response.refresh_token !== stored) {
      this.store.saveCredentials(response.refresh_token);
      this.state = {
        status: 'configured',
        config: { ...this.state.config, refreshToken: response.refresh_token },
      };
    }

    this.session = {
      accessToken: response.id_token,
      userId: response.user_id,
      expiresAt: now + Number(response.expires_in) * 1000,
    };
    return this.session;
  }
}
