/**
 * HTTP helpers shared by the token endpoint and the resource clients.
 *
 * Uses the global fetch. Network failures and timeouts surface as
 * TransientNetworkError; payloads are validated with zod.
 */

import type { z } from "zod";
import { SyncError, TransientNetworkError, describeError } from "./errors.js";

const DEFAULT_TIMEOUT_MS = 60_000;

export async function send(
  url: string,
  init: RequestInit = {},
  timeoutMs: number = DEFAULT_TIMEOUT_MS
): Promise<Response> {
  try {
    return await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw new TransientNetworkError(`Request to ${url} failed: ${describeError(error)}`, null, { cause: error });
  }
}

/**
 * Seconds to wait from a Retry-After header (delta-seconds or HTTP date).
 * Returns null when the header is missing or unparseable.
 */
export function parseRetryAfter(response: Response, now: number = Date.now()): number | null {
  const header = response.headers.get("Retry-After");
  if (!header) return null;

  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.ceil(seconds);
  }

  const date = Date.parse(header);
  if (!Number.isNaN(date)) {
    return Math.max(0, Math.ceil((date - now) / 1000));
  }
  return null;
}

export function isServerError(status: number): boolean {
  return status >= 500 && status < 600;
}

/**
 * Parse a JSON body against a schema.
 *
 * @throws SyncError (non-retryable) when the payload does not match
 */
export async function readJson<S extends z.ZodTypeAny>(
  response: Response,
  schema: S,
  context: string
): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new SyncError(`${context}: response is not JSON`, false, { cause: error });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SyncError(
      `${context}: unexpected payload (${issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid"})`,
      false
    );
  }
  return parsed.data;
}

export async function readText(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 500);
  } catch {
    return "";
  }
}
