/**
 * Strava - Token Manager
 *
 * Obtains a valid short-lived access token.
 *
 * Order of credential sources:
 * 1. Static access token (bootstrap / test escape hatch, returned unchanged)
 * 2. Refresh token from the CredentialStore, else the configured seed
 * 3. One-time authorization code (only after the refresh token is rejected
 *    or when no refresh token exists at all)
 *
 * A rotated refresh token is written to the store before the access token
 * is handed out, so a crash right after acquisition never loses it.
 */

import { setupLogger } from "../../lib/logger.js";
import type { CredentialStore } from "../../lib/credential-store.js";
import { AuthError, HttpError, TransientNetworkError, describeError } from "../../lib/errors.js";
import { isServerError, readJson, readText, send } from "../../lib/http.js";
import { httpBackoff, withRetry, type Sleep } from "../../lib/retry.js";
import { tokenResponseSchema, type TokenResponse } from "./types.js";

const logger = setupLogger("strava-auth");

export const STRAVA_TOKEN_URL = "https://www.strava.com/oauth/token";
const EXPIRY_THRESHOLD_MS = 5 * 60 * 1000;
const DEFAULT_TOKEN_LIFETIME_SEC = 6 * 60 * 60;

export interface AccessTokenProvider {
  getAccessToken(forceRefresh?: boolean): Promise<string>;
}

export interface TokenManagerOptions {
  clientId: string | null;
  clientSecret: string | null;
  /** Durable store; null runs in degraded mode (rotations are not persisted) */
  store: CredentialStore | null;
  seedRefreshToken?: string | null;
  authCode?: string | null;
  redirectUri?: string | null;
  staticAccessToken?: string | null;
  tokenUrl?: string;
  maxAttempts?: number;
  backoffMs?: number;
  sleep?: Sleep;
}

interface GrantParams {
  grant_type: "refresh_token" | "authorization_code";
  [field: string]: string;
}

type ExchangeResult = { kind: "ok"; token: TokenResponse } | { kind: "rejected"; status: number };

export class TokenManager implements AccessTokenProvider {
  private cached: { accessToken: string; expiresAt: Date } | null = null;
  private inFlight: Promise<string> | null = null;
  private authCodeUsed = false;
  private readonly tokenUrl: string;
  private readonly maxAttempts: number;
  private readonly backoffMs: number;

  constructor(private readonly options: TokenManagerOptions) {
    this.tokenUrl = options.tokenUrl ?? STRAVA_TOKEN_URL;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.backoffMs = options.backoffMs ?? 2000;
  }

  /**
   * Get an access token (cached until close to expiry).
   *
   * @param forceRefresh - Ignore the cache, e.g. after a 401 from the API
   * @throws AuthError when every credential source is exhausted
   */
  async getAccessToken(forceRefresh: boolean = false): Promise<string> {
    if (this.options.staticAccessToken) {
      return this.options.staticAccessToken;
    }

    if (!forceRefresh && this.cached !== null) {
      if (this.cached.expiresAt.getTime() - Date.now() > EXPIRY_THRESHOLD_MS) {
        logger.debug("Using cached access token");
        return this.cached.accessToken;
      }
    }

    if (this.inFlight !== null) {
      return this.inFlight;
    }

    this.inFlight = this.acquire();
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  private async currentRefreshToken(): Promise<string | null> {
    const { store, seedRefreshToken } = this.options;
    if (store !== null) {
      try {
        const stored = await store.load();
        if (stored !== null) {
          logger.debug(`Using refresh token from ${store.name} store`);
          return stored.refreshToken;
        }
      } catch (error) {
        logger.warn(`Credential store unavailable, falling back to seed token: ${describeError(error)}`);
      }
    }
    return seedRefreshToken ?? null;
  }

  private async acquire(): Promise<string> {
    const refreshToken = await this.currentRefreshToken();

    if (refreshToken !== null) {
      logger.info("Refreshing access token...");
      const result = await this.exchange({ grant_type: "refresh_token", refresh_token: refreshToken });
      if (result.kind === "ok") {
        await this.persistRotation(refreshToken, result.token);
        return this.remember(result.token);
      }
      logger.warn(`Refresh token rejected (HTTP ${result.status})`);
    }

    const { authCode, redirectUri } = this.options;
    if (authCode && !this.authCodeUsed) {
      this.authCodeUsed = true;
      logger.info("Exchanging authorization code for a new token pair...");
      const grant: GrantParams = { grant_type: "authorization_code", code: authCode };
      if (redirectUri) {
        grant.redirect_uri = redirectUri;
      }
      const result = await this.exchange(grant);
      if (result.kind === "ok") {
        await this.persistRotation(refreshToken, result.token);
        return this.remember(result.token);
      }
      logger.error(`Authorization code rejected (HTTP ${result.status})`);
    }

    throw new AuthError("no valid credential");
  }

  private async exchange(grant: GrantParams): Promise<ExchangeResult> {
    const { clientId, clientSecret } = this.options;
    if (!clientId || !clientSecret) {
      throw new AuthError("Token exchange requires client_id and client_secret");
    }

    const body = new URLSearchParams({ client_id: clientId, client_secret: clientSecret, ...grant });

    try {
      return await withRetry(
        async (): Promise<ExchangeResult> => {
          const response = await send(this.tokenUrl, {
            method: "POST",
            headers: { "Content-Type": "application/x-www-form-urlencoded" },
            body,
          });

          if (response.ok) {
            const token = await readJson(response, tokenResponseSchema, "Token response");
            return { kind: "ok", token };
          }
          if (response.status === 400 || response.status === 401) {
            return { kind: "rejected", status: response.status };
          }
          if (isServerError(response.status) || response.status === 429) {
            throw new TransientNetworkError(`Token endpoint returned ${response.status}`, response.status);
          }
          throw new HttpError(response.status, await readText(response));
        },
        {
          maxAttempts: this.maxAttempts,
          delayMs: httpBackoff({ rateLimitWaitSec: this.backoffMs / 1000, transientBackoffMs: this.backoffMs }),
          onRetry: (error, attempt) =>
            logger.warn(`Token exchange failed (${describeError(error)}), retry ${attempt}/${this.maxAttempts - 1}`),
          sleep: this.options.sleep,
        }
      );
    } catch (error) {
      throw new AuthError(`Token exchange failed: ${describeError(error)}`, { cause: error });
    }
  }

  private async persistRotation(previous: string | null, token: TokenResponse): Promise<void> {
    const next = token.refresh_token;
    if (!next || next === previous) {
      return;
    }

    const { store } = this.options;
    if (store === null) {
      logger.warn("Refresh token rotated but no credential store is configured; it will not survive this process");
      return;
    }

    try {
      await store.save({ accessToken: null, refreshToken: next, expiresAt: this.expiryOf(token) });
      logger.info(`Rotated refresh token saved to ${store.name} store`);
    } catch (error) {
      logger.error(`Failed to persist rotated refresh token: ${describeError(error)}`);
    }
  }

  private expiryOf(token: TokenResponse): Date {
    if (token.expires_at !== undefined) {
      return new Date(token.expires_at * 1000);
    }
    return new Date(Date.now() + (token.expires_in ?? DEFAULT_TOKEN_LIFETIME_SEC) * 1000);
  }

  private remember(token: TokenResponse): string {
    const expiresAt = this.expiryOf(token);
    this.cached = { accessToken: token.access_token, expiresAt };
    logger.info(`Access token acquired (expires: ${expiresAt.toISOString()})`);
    return token.access_token;
  }
}
