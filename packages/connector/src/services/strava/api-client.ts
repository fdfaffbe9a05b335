/**
 * Strava API Client
 *
 * Authenticated GET requests against the Strava v3 API.
 * Data fetching only, no DB operations.
 *
 * Response handling:
 * - 429: wait for Retry-After (or the configured fixed wait), re-issue the same request
 * - 401: force one token refresh and re-issue; a second 401 is an AuthError
 * - 404: null (caller decides whether that means "absent")
 * - 5xx / network: fixed backoff, bounded attempts
 */

import type { z } from "zod";
import { setupLogger } from "../../lib/logger.js";
import {
  AuthError,
  HttpError,
  NotFoundError,
  RateLimitedError,
  TransientNetworkError,
  UnauthorizedError,
  describeError,
} from "../../lib/errors.js";
import { isServerError, parseRetryAfter, readJson, readText, send } from "../../lib/http.js";
import { httpBackoff, withRetry, type Sleep } from "../../lib/retry.js";
import type { AccessTokenProvider } from "./token-manager.js";

const logger = setupLogger("strava-api");

export const STRAVA_API_BASE = "https://www.strava.com/api/v3";

export interface ApiClientOptions {
  baseUrl?: string;
  /** Wait used for 429 responses without Retry-After */
  rateLimitWaitSec?: number;
  transientBackoffMs?: number;
  timeoutMs?: number;
  sleep?: Sleep;
}

export interface RequestOptions {
  /** Attempts per request across 429 and transient failures */
  maxAttempts: number;
}

export type Query = Record<string, string | number | undefined>;

export class StravaApiClient {
  private readonly baseUrl: string;
  private readonly rateLimitWaitSec: number;
  private readonly transientBackoffMs: number;
  private readonly timeoutMs: number | undefined;
  private readonly sleep: Sleep | undefined;
  requestCount = 0;

  constructor(
    private readonly tokens: AccessTokenProvider,
    options: ApiClientOptions = {}
  ) {
    this.baseUrl = (options.baseUrl ?? STRAVA_API_BASE).replace(/\/+$/, "");
    this.rateLimitWaitSec = options.rateLimitWaitSec ?? 60;
    this.transientBackoffMs = options.transientBackoffMs ?? 5000;
    this.timeoutMs = options.timeoutMs;
    this.sleep = options.sleep;
  }

  buildUrl(path: string, query: Query = {}): string {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        params.set(key, String(value));
      }
    }
    const qs = params.toString();
    return `${this.baseUrl}${path}${qs ? `?${qs}` : ""}`;
  }

  /**
   * GET a resource and validate it.
   *
   * @returns Parsed payload, or null on 404
   * @throws AuthError after a refresh did not cure a 401
   */
  async get<S extends z.ZodTypeAny>(
    path: string,
    query: Query,
    schema: S,
    options: RequestOptions
  ): Promise<z.output<S> | null> {
    const url = this.buildUrl(path, query);

    const token = await this.tokens.getAccessToken();
    try {
      return await this.getWithRetry(url, token, schema, options);
    } catch (error) {
      if (!(error instanceof UnauthorizedError)) {
        throw error;
      }
    }

    logger.warn("Access token rejected (401), refreshing...");
    const freshToken = await this.tokens.getAccessToken(true);
    try {
      return await this.getWithRetry(url, freshToken, schema, options);
    } catch (error) {
      if (error instanceof UnauthorizedError) {
        throw new AuthError(`Access token rejected twice for ${path}`, { cause: error });
      }
      throw error;
    }
  }

  private async getWithRetry<S extends z.ZodTypeAny>(
    url: string,
    token: string,
    schema: S,
    options: RequestOptions
  ): Promise<z.output<S> | null> {
    return withRetry(
      async () => {
        this.requestCount++;
        logger.debug(`GET ${url.slice(this.baseUrl.length)}`);
        const response = await send(url, { headers: { Authorization: `Bearer ${token}` } }, this.timeoutMs);

        if (response.ok) {
          return readJson(response, schema, `GET ${url}`);
        }
        switch (response.status) {
          case 401:
            throw new UnauthorizedError(url);
          case 404:
            return null;
          case 429:
            throw new RateLimitedError(parseRetryAfter(response));
        }
        if (isServerError(response.status)) {
          throw new TransientNetworkError(`Server error (${response.status})`, response.status);
        }
        throw new HttpError(response.status, await readText(response));
      },
      {
        maxAttempts: options.maxAttempts,
        delayMs: httpBackoff({
          rateLimitWaitSec: this.rateLimitWaitSec,
          transientBackoffMs: this.transientBackoffMs,
        }),
        onRetry: (error, attempt, delayMs) => {
          if (error instanceof RateLimitedError) {
            logger.warn(`Rate limited (429). Waiting ${Math.round(delayMs / 1000)}s... [attempt ${attempt}]`);
          } else {
            logger.warn(`${describeError(error)}. Retrying in ${Math.round(delayMs / 1000)}s... [attempt ${attempt}]`);
          }
        },
        sleep: this.sleep,
      }
    );
  }

  /**
   * GET a resource that must exist.
   *
   * @throws NotFoundError on 404
   */
  async getRequired<S extends z.ZodTypeAny>(
    path: string,
    query: Query,
    schema: S,
    options: RequestOptions
  ): Promise<z.output<S>> {
    const result = await this.get(path, query, schema, options);
    if (result === null) {
      throw new NotFoundError(path);
    }
    return result;
  }
}
