/**
 * Credential store
 *
 * Persists the rotating OAuth refresh token. The access token is kept in
 * memory by the TokenManager and is not written by any store.
 *
 * Single-writer assumption: do not run two syncs against one store.
 */

import { z } from "zod";
import { StorageError, describeError } from "./errors.js";
import { readFileIfExists, writeFileAtomic } from "./files.js";

export interface Credential {
  accessToken: string | null;
  refreshToken: string;
  expiresAt: Date | null;
}

export interface CredentialStore {
  readonly name: string;
  /** Stored credential, or null when nothing has been saved yet */
  load(): Promise<Credential | null>;
  /** Idempotent overwrite of the stored refresh token */
  save(credential: Credential): Promise<void>;
}

export const storedCredentialSchema = z.object({
  refresh_token: z.string().min(1),
  updated_at: z.string().optional(),
});

export function toStoredCredential(credential: Credential): z.infer<typeof storedCredentialSchema> {
  return {
    refresh_token: credential.refreshToken,
    updated_at: new Date().toISOString(),
  };
}

/**
 * JSON file store (local runs, CI cache directories)
 */
export class FileCredentialStore implements CredentialStore {
  readonly name = "file";

  constructor(private readonly filePath: string) {}

  async load(): Promise<Credential | null> {
    let raw: string | null;
    try {
      raw = await readFileIfExists(this.filePath);
    } catch (error) {
      throw new StorageError(this.name, `Failed to read ${this.filePath}: ${describeError(error)}`, { cause: error });
    }
    if (raw === null || raw.trim() === "") {
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StorageError(this.name, `${this.filePath} is not valid JSON`, { cause: error });
    }
    const parsed = storedCredentialSchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageError(this.name, `${this.filePath} has no refresh_token`);
    }
    return { accessToken: null, refreshToken: parsed.data.refresh_token, expiresAt: null };
  }

  async save(credential: Credential): Promise<void> {
    try {
      await writeFileAtomic(this.filePath, JSON.stringify(toStoredCredential(credential), null, 2) + "\n");
    } catch (error) {
      throw new StorageError(this.name, `Failed to write ${this.filePath}: ${describeError(error)}`, { cause: error });
    }
  }
}

/**
 * Process-local store (degraded mode, tests)
 */
export class MemoryCredentialStore implements CredentialStore {
  readonly name = "memory";
  private current: Credential | null;
  saveCount = 0;

  constructor(initial: Credential | null = null) {
    this.current = initial;
  }

  async load(): Promise<Credential | null> {
    return this.current === null ? null : { ...this.current, accessToken: null };
  }

  async save(credential: Credential): Promise<void> {
    this.saveCount++;
    this.current = { ...credential, accessToken: null };
  }
}
