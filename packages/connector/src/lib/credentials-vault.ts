/**
 * Credentials vault using Supabase Vault
 *
 * Stores the Strava refresh token in vault.secrets.
 * Uses direct DB connection for vault functions.
 *
 * Storage format in vault.secrets.secret (JSON string):
 * {
 *   "refresh_token": "...",
 *   "updated_at": "2024-01-01T00:00:00.000Z",
 *   "_auth_type": "oauth2"
 * }
 */

import pg from "pg";
import type { Credential, CredentialStore } from "./credential-store.js";
import { storedCredentialSchema, toStoredCredential } from "./credential-store.js";
import { StorageError, describeError } from "./errors.js";
import { setupLogger } from "./logger.js";

const { Client } = pg;
const logger = setupLogger("credentials-vault");

interface SecretRow {
  id: string;
  decrypted_secret: string | null;
}

export class VaultCredentialStore implements CredentialStore {
  readonly name = "vault";

  /**
   * @param databaseUrl - Direct (non-pooled) connection string
   * @param service - Secret name in vault.secrets
   */
  constructor(
    private readonly databaseUrl: string,
    private readonly service: string = "strava"
  ) {}

  private async withClient<T>(action: string, fn: (client: pg.Client) => Promise<T>): Promise<T> {
    const client = new Client({ connectionString: this.databaseUrl });
    try {
      await client.connect();
      return await fn(client);
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(this.name, `${action} failed: ${describeError(error)}`, { cause: error });
    } finally {
      await client.end();
    }
  }

  async load(): Promise<Credential | null> {
    return this.withClient("load", async (client) => {
      logger.debug(`Loading ${this.service} credentials from vault...`);
      const result = await client.query<SecretRow>(
        "SELECT id, decrypted_secret FROM vault.decrypted_secrets WHERE name = $1",
        [this.service]
      );

      const secret = result.rows[0]?.decrypted_secret;
      if (!secret) {
        return null;
      }

      const parsed = storedCredentialSchema.safeParse(JSON.parse(secret));
      if (!parsed.success) {
        throw new StorageError(this.name, `Secret ${this.service} has no refresh_token`);
      }
      return { accessToken: null, refreshToken: parsed.data.refresh_token, expiresAt: null };
    });
  }

  async save(credential: Credential): Promise<void> {
    const secretJson = JSON.stringify({ ...toStoredCredential(credential), _auth_type: "oauth2" });
    const description = `${this.service} credentials`;

    await this.withClient("save", async (client) => {
      const existing = await client.query<{ id: string }>(
        "SELECT id FROM vault.secrets WHERE name = $1",
        [this.service]
      );

      if (existing.rows.length > 0) {
        await client.query("SELECT vault.update_secret($1, $2, $3, $4)", [
          existing.rows[0].id,
          secretJson,
          this.service,
          description,
        ]);
      } else {
        await client.query("SELECT vault.create_secret($1, $2, $3)", [secretJson, this.service, description]);
      }
      logger.debug(`Saved ${this.service} credentials to vault`);
    });
  }
}
