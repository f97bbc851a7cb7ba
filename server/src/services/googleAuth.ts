/**
 * Google OAuth token handling
 *
 * Loads a cached authorized-user token from disk, refreshes it when it is
 * about to expire and writes the refreshed token back. The initial consent
 * flow happens outside this server; it only needs the resulting token file.
 *
 * Accepts both token file layouts in common use:
 * - { access_token, refresh_token, expiry_date }             (OAuth2Client credentials)
 * - { token, refresh_token, expiry, client_id, client_secret } (authorized-user file)
 */

import { promises as fsp } from 'fs';
import path from 'path';
import { z } from 'zod';
import { fetchWithTimeout, FetchFn } from './http';
import { logger } from './logger';

const GOOGLE_TOKEN_URI = 'https://oauth2.googleapis.com/token';

// Refresh this long before the recorded expiry
const EXPIRY_SKEW_MS = 5 * 60 * 1000;

export class GoogleAuthError extends Error {
  constructor(message: string, public readonly code: 'NOT_CONFIGURED' | 'NOT_AUTHORIZED' | 'REFRESH_FAILED') {
    super(message);
    this.name = 'GoogleAuthError';
  }
}

// =============================================================================
// FILE FORMATS
// =============================================================================

const ClientSecretEntry = z.object({
  client_id: z.string(),
  client_secret: z.string(),
  token_uri: z.string().url().optional(),
});

const ClientSecretFile = z.union([
  z.object({ installed: ClientSecretEntry }).transform((f) => f.installed),
  z.object({ web: ClientSecretEntry }).transform((f) => f.web),
]);

export type ClientSecret = z.infer<typeof ClientSecretEntry>;

const CredentialsFile = z.object({
  access_token: z.string(),
  refresh_token: z.string().optional(),
  expiry_date: z.number().optional(),
  token_uri: z.string().url().optional(),
  client_id: z.string().optional(),
  client_secret: z.string().optional(),
});

const AuthorizedUserFile = z.object({
  token: z.string(),
  refresh_token: z.string().optional(),
  expiry: z.string().optional(),
  token_uri: z.string().url().optional(),
  client_id: z.string().optional(),
  client_secret: z.string().optional(),
});

export interface StoredToken {
  accessToken: string;
  refreshToken?: string;
  // epoch ms; undefined means "unknown, try it"
  expiresAt?: number;
  tokenUri?: string;
  clientId?: string;
  clientSecret?: string;
}

export function parseTokenFile(raw: unknown): StoredToken | null {
  const credentials = CredentialsFile.safeParse(raw);
  if (credentials.success) {
    return {
      accessToken: credentials.data.access_token,
      refreshToken: credentials.data.refresh_token,
      expiresAt: credentials.data.expiry_date,
      tokenUri: credentials.data.token_uri,
      clientId: credentials.data.client_id,
      clientSecret: credentials.data.client_secret,
    };
  }

  const authorizedUser = AuthorizedUserFile.safeParse(raw);
  if (authorizedUser.success) {
    // Naive timestamps are UTC; fractions may run to microseconds
    const expiry = authorizedUser.data.expiry?.replace(/(\.\d{3})\d+/, '$1');
    const expiresAt = expiry ? Date.parse(/[zZ]|[+-]\d{2}:?\d{2}$/.test(expiry) ? expiry : `${expiry}Z`) : NaN;
    return {
      accessToken: authorizedUser.data.token,
      refreshToken: authorizedUser.data.refresh_token,
      expiresAt: Number.isNaN(expiresAt) ? undefined : expiresAt,
      tokenUri: authorizedUser.data.token_uri,
      clientId: authorizedUser.data.client_id,
      clientSecret: authorizedUser.data.client_secret,
    };
  }

  return null;
}

const RefreshResponse = z.object({
  access_token: z.string(),
  expires_in: z.number(),
  refresh_token: z.string().optional(),
});

// =============================================================================
// TOKEN STORE
// =============================================================================

export interface TokenStore {
  load(): Promise<StoredToken | null>;
  save(token: StoredToken): Promise<void>;
}

export class FileTokenStore implements TokenStore {
  constructor(private filePath: string) {}

  async load(): Promise<StoredToken | null> {
    let text: string;
    try {
      text = await fsp.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw error;
    }
    const token = parseTokenFile(JSON.parse(text));
    if (!token) {
      logger.warn('Token file has an unrecognized layout', { filePath: this.filePath });
    }
    return token;
  }

  async save(token: StoredToken): Promise<void> {
    await fsp.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
    const body = {
      access_token: token.accessToken,
      refresh_token: token.refreshToken,
      expiry_date: token.expiresAt,
      token_uri: token.tokenUri,
      client_id: token.clientId,
      client_secret: token.clientSecret,
    };
    await fsp.writeFile(this.filePath, JSON.stringify(body, null, 2), { encoding: 'utf-8', mode: 0o600 });
  }
}

export async function readClientSecret(filePath: string): Promise<ClientSecret | null> {
  try {
    const text = await fsp.readFile(filePath, 'utf-8');
    const parsed = ClientSecretFile.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    throw error;
  }
}

// =============================================================================
// AUTH CLIENT
// =============================================================================

export interface GoogleAuthClientOptions {
  clientSecretPath: string;
  tokenStore: TokenStore;
  fetchImpl?: FetchFn;
  timeoutMs?: number;
  now?: () => number;
}

export class GoogleAuthClient {
  private now: () => number;

  constructor(private options: GoogleAuthClientOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Return a usable access token, refreshing and persisting it if needed
   */
  async getAccessToken(): Promise<string> {
    const token = await this.options.tokenStore.load();
    if (!token) {
      throw new GoogleAuthError('No cached Google token; complete the OAuth consent flow first', 'NOT_AUTHORIZED');
    }

    if (token.expiresAt === undefined || this.now() < token.expiresAt - EXPIRY_SKEW_MS) {
      return token.accessToken;
    }

    const refreshed = await this.refresh(token);
    await this.options.tokenStore.save(refreshed);
    return refreshed.accessToken;
  }

  private async refresh(token: StoredToken): Promise<StoredToken> {
    if (!token.refreshToken) {
      throw new GoogleAuthError('Cached Google token expired and has no refresh token', 'NOT_AUTHORIZED');
    }

    let clientId = token.clientId;
    let clientSecret = token.clientSecret;
    let tokenUri = token.tokenUri;

    if (!clientId || !clientSecret) {
      const secret = await readClientSecret(this.options.clientSecretPath);
      if (!secret) {
        throw new GoogleAuthError('Google OAuth client secret not configured', 'NOT_CONFIGURED');
      }
      clientId = secret.client_id;
      clientSecret = secret.client_secret;
      tokenUri = tokenUri ?? secret.token_uri;
    }

    const response = await fetchWithTimeout(
      tokenUri ?? GOOGLE_TOKEN_URI,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({
          grant_type: 'refresh_token',
          refresh_token: token.refreshToken,
          client_id: clientId,
          client_secret: clientSecret,
        }),
      },
      { fetchImpl: this.options.fetchImpl, timeoutMs: this.options.timeoutMs }
    );

    if (!response.ok) {
      logger.error('Failed to refresh Google token', { status: response.status });
      throw new GoogleAuthError(`Token refresh failed with status ${response.status}`, 'REFRESH_FAILED');
    }

    const data = RefreshResponse.parse(await response.json());
    logger.info('Refreshed Google access token');

    return {
      ...token,
      accessToken: data.access_token,
      refreshToken: data.refresh_token ?? token.refreshToken,
      expiresAt: this.now() + data.expires_in * 1000,
    };
  }
}
