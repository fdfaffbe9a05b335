import { describe, it, expect, vi } from "vitest";
import { http, HttpResponse } from "msw";
import { z } from "zod";
import { server } from "../../__tests__/setup.js";
import { API_BASE } from "../../__tests__/fixtures.js";
import { AuthError, HttpError, NotFoundError, TransientNetworkError } from "../../lib/errors.js";
import { StravaApiClient } from "./api-client.js";
import type { AccessTokenProvider } from "./token-manager.js";

const athleteSchema = z.object({ id: z.number() });

function tokens() {
  return { getAccessToken: vi.fn(async (forceRefresh?: boolean) => (forceRefresh ? "fresh" : "stale")) };
}

function client(provider: AccessTokenProvider = tokens()) {
  const sleep = vi.fn(async (_ms: number) => {});
  const api = new StravaApiClient(provider, { baseUrl: API_BASE, rateLimitWaitSec: 60, transientBackoffMs: 5000, sleep });
  return { api, sleep };
}

describe("StravaApiClient", () => {
  it("should build URLs without undefined query values", () => {
    const { api } = client();

    expect(api.buildUrl("/athlete/activities", { page: 2, per_page: 200, after: undefined })).toBe(
      `${API_BASE}/athlete/activities?page=2&per_page=200`
    );
  });

  it("should send the bearer token and validate the payload", async () => {
    server.use(
      http.get(`${API_BASE}/athlete`, ({ request }) =>
        request.headers.get("Authorization") === "Bearer stale"
          ? HttpResponse.json({ id: 42, firstname: "Test" })
          : new HttpResponse(null, { status: 401 })
      )
    );
    const { api } = client();

    await expect(api.get("/athlete", {}, athleteSchema, { maxAttempts: 3 })).resolves.toEqual({ id: 42 });
    expect(api.requestCount).toBe(1);
  });

  it("should refresh once on 401 and re-issue the request", async () => {
    server.use(
      http.get(`${API_BASE}/athlete`, ({ request }) =>
        request.headers.get("Authorization") === "Bearer fresh"
          ? HttpResponse.json({ id: 42 })
          : new HttpResponse(null, { status: 401 })
      )
    );
    const provider = tokens();
    const { api } = client(provider);

    await expect(api.get("/athlete", {}, athleteSchema, { maxAttempts: 3 })).resolves.toEqual({ id: 42 });
    expect(provider.getAccessToken).toHaveBeenCalledTimes(2);
    expect(provider.getAccessToken).toHaveBeenLastCalledWith(true);
  });

  it("should raise AuthError when the refreshed token is rejected too", async () => {
    server.use(http.get(`${API_BASE}/athlete`, () => new HttpResponse(null, { status: 401 })));
    const { api } = client();

    const error = await api.get("/athlete", {}, athleteSchema, { maxAttempts: 3 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toHaveProperty("message", "Access token rejected twice for /athlete");
    expect(api.requestCount).toBe(2);
  });

  it("should return null for 404 and throw NotFoundError from getRequired", async () => {
    server.use(http.get(`${API_BASE}/activities/9`, () => HttpResponse.json({ message: "Record Not Found" }, { status: 404 })));
    const { api } = client();

    await expect(api.get("/activities/9", {}, athleteSchema, { maxAttempts: 3 })).resolves.toBeNull();
    await expect(api.getRequired("/activities/9", {}, athleteSchema, { maxAttempts: 3 })).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it("should wait for Retry-After on 429 and re-issue the same request", async () => {
    let calls = 0;
    server.use(
      http.get(`${API_BASE}/athlete`, () => {
        calls++;
        return calls === 1
          ? new HttpResponse(null, { status: 429, headers: { "Retry-After": "7" } })
          : HttpResponse.json({ id: 42 });
      })
    );
    const { api, sleep } = client();

    await expect(api.get("/athlete", {}, athleteSchema, { maxAttempts: 3 })).resolves.toEqual({ id: 42 });
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(7000);
    expect(api.requestCount).toBe(2);
  });

  it("should use the configured wait when 429 has no Retry-After", async () => {
    let calls = 0;
    server.use(
      http.get(`${API_BASE}/athlete`, () => {
        calls++;
        return calls === 1 ? new HttpResponse(null, { status: 429 }) : HttpResponse.json({ id: 42 });
      })
    );
    const { api, sleep } = client();

    await api.get("/athlete", {}, athleteSchema, { maxAttempts: 3 });

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(60_000);
  });

  it("should give up on persistent server errors after maxAttempts", async () => {
    server.use(http.get(`${API_BASE}/athlete`, () => new HttpResponse("oops", { status: 500 })));
    const { api, sleep } = client();

    await expect(api.get("/athlete", {}, athleteSchema, { maxAttempts: 3 })).rejects.toBeInstanceOf(TransientNetworkError);
    expect(api.requestCount).toBe(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(5000);
  });

  it("should not retry other client errors", async () => {
    server.use(http.get(`${API_BASE}/athlete`, () => new HttpResponse("bad param", { status: 400 })));
    const { api } = client();

    const error = await api.get("/athlete", {}, athleteSchema, { maxAttempts: 3 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toHaveProperty("message", "HTTP 400: bad param");
    expect(api.requestCount).toBe(1);
  });
});
