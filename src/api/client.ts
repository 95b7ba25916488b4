/**
 * MacroFactor API Client
 * Low-level HTTP client: Firebase email/password auth, token refresh,
 * Firestore REST documents and the food search endpoint.
 */

import { AuthError, ApiError } from '../errors.js';
import type { BatchGetResult, FirestoreDocument } from './firestore.js';
import {
  FirebaseErrorSchema,
  RefreshResponseSchema,
  SignInResponseSchema,
  parseResponse,
  type RefreshResponse,
  type SignInResponse,
} from './types.js';

export interface MacroFactorClientConfig {
  apiKey: string;
  projectId: string;
  searchUrl: string;
  iosBundleId?: string;
  debug?: boolean;
}

const IDENTITY_TOOLKIT_URL = 'https://identitytoolkit.googleapis.com/v1';
const SECURE_TOKEN_URL = 'https://securetoken.googleapis.com/v1/token';
const FIRESTORE_URL = 'https://firestore.googleapis.com/v1';

/**
 * Pull the most specific message out of a failed response body
 */
async function readErrorMessage(response: Response): Promise<string> {
  try {
    const parsed = FirebaseErrorSchema.safeParse(await response.json());
    return parsed.success ? parsed.data.error.message : response.statusText;
  } catch {
    return response.statusText;
  }
}

export class MacroFactorClient {
  private readonly documentsUrl: string;
  readonly databasePath: string;

  constructor(private readonly config: MacroFactorClientConfig) {
    this.databasePath = `projects/${config.projectId}/databases/(default)/documents`;
    this.documentsUrl = `${FIRESTORE_URL}/${this.databasePath}`;
  }

  private log(method: string, url: string, status: number | string): void {
    if (this.config.debug) {
      const { pathname } = new URL(url);
      console.error(`[macrofactor] ${method} ${pathname} ${status}`);
    }
  }

  /**
   * fetch wrapper that turns transport failures into ApiError
   */
  private async send(url: string, init: RequestInit): Promise<Response> {
    const method = init.method ?? 'GET';
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log(method, url, 'network-error');
      throw new ApiError(`Network error: ${message}`);
    }
    this.log(method, url, response.status);
    return response;
  }

  private authHeaders(): Record<string, string> {
    return this.config.iosBundleId ? { 'X-Ios-Bundle-Identifier': this.config.iosBundleId } : {};
  }

  /**
   * Exchange email and password for a refresh token
   */
  async signInWithPassword(email: string, password: string): Promise<SignInResponse> {
    const url = `${IDENTITY_TOOLKIT_URL}/accounts:signInWithPassword?key=${encodeURIComponent(this.config.apiKey)}`;
    const response = await this.send(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...this.authHeaders() },
      body: JSON.stringify({ email, password, returnSecureToken: true }),
    });

    if (!response.ok) {
      throw new AuthError(`Login failed: ${await readErrorMessage(response)}`);
    }

    return parseResponse(SignInResponseSchema, await response.json(), 'sign-in');
  }

  /**
   * Exchange a refresh token for a short-lived access token.
   * The response may carry a rotated refresh token.
   */
  async refreshToken(refreshToken: string): Promise<RefreshResponse> {
    const url = `${SECURE_TOKEN_URL}?key=${encodeURIComponent(this.config.apiKey)}`;
    const response = await this.send(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded', ...this.authHeaders() },
      body: new URLSearchParams({ grant_type: 'refresh_token', refresh_token: refreshToken }).toString(),
    });

    if (!response.ok) {
      throw new AuthError(
        `Session expired or revoked (${await readErrorMessage(response)}). Run \`macrofactor-cli login\` again.`
      );
    }

    return parseResponse(RefreshResponseSchema, await response.json(), 'token refresh');
  }

  /**
   * Make an authenticated Firestore request.
   * `path` is relative to the documents root and may carry a query string or a `:method` suffix.
   */
  async request<T>(path: string, accessToken: string, options: RequestInit = {}): Promise<T> {
    return this.authorizedRequest<T>(`${this.documentsUrl}${path}`, accessToken, options);
  }

  /**
   * Fetch several documents in one round trip, returned in the requested order with missing ones dropped
   */
  async batchGet(documentPaths: string[], accessToken: string): Promise<FirestoreDocument[]> {
    if (documentPaths.length === 0) return [];

    const names = documentPaths.map((path) => `${this.databasePath}/${path}`);
    const results = await this.request<BatchGetResult[]>(':batchGet', accessToken, {
      method: 'POST',
      body: JSON.stringify({ documents: names }),
    });

    const found = new Map<string, FirestoreDocument>();
    for (const result of results) {
      if ('found' in result) {
        found.set(result.found.name, result.found);
      }
    }
    return names.flatMap((name) => {
      const doc = found.get(name);
      return doc ? [doc] : [];
    });
  }

  /**
   * Query the food search endpoint
   */
  async searchRequest<T>(params: URLSearchParams, accessToken: string): Promise<T> {
    return this.authorizedRequest<T>(`${this.config.searchUrl}?${params.toString()}`, accessToken);
  }

  private async authorizedRequest<T>(url: string, accessToken: string, options: RequestInit = {}): Promise<T> {
    const response = await this.send(url, {
      ...options,
      headers: {
        Accept: 'application/json',
        Authorization: `Bearer ${accessToken}`,
        ...(options.body !== undefined && { 'Content-Type': 'application/json' }),
        ...options.headers,
      },
    });

    if (!response.ok) {
      if (response.status === 401 || response.status === 403) {
        throw new AuthError(`Access denied (HTTP ${response.status}). Run \`macrofactor-cli login\` again.`);
      }
      const message = await readErrorMessage(response);
      throw new ApiError(`API request failed: ${message}`, response.status);
    }

    return response.json() as Promise<T>;
  }
}
