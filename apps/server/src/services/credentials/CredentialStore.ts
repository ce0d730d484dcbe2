import type { CalendarProvider } from "../calendar/CalendarAdapter.js";
import type { DatabaseHandle } from "../roomDb.js";

export interface Credential {
  provider: CalendarProvider;
  accessToken: string;
  refreshToken: string | null;
  /** null: the access token does not expire. */
  expiresAt: Date | null;
  scope: string[];
}

export interface CredentialRepository {
  get(provider: CalendarProvider): Credential | null;
  save(credential: Credential): void;
}

interface TokenRow {
  provider: string;
  access_token: string;
  refresh_token: string | null;
  expires_at: string | null;
  scope: string | null;
}

export class CredentialStore implements CredentialRepository {
  constructor(private database: DatabaseHandle) {}

  get(provider: CalendarProvider): Credential | null {
    const row = this.database
      .prepare<[string], TokenRow>("SELECT * FROM calendar_tokens WHERE provider = ?")
      .get(provider);
    if (!row) return null;

    return {
      provider,
      accessToken: row.access_token,
      refreshToken: row.refresh_token,
      expiresAt: row.expires_at ? new Date(row.expires_at) : null,
      scope: row.scope ? row.scope.split(" ").filter(Boolean) : [],
    };
  }

  save(credential: Credential): void {
    const now = new Date().toISOString();
    this.database
      .prepare<[string, string, string | null, string | null, string, string, string]>(
        `INSERT INTO calendar_tokens
         (provider, access_token, refresh_token, expires_at, scope, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(provider) DO UPDATE SET
           access_token = excluded.access_token,
           refresh_token = excluded.refresh_token,
           expires_at = excluded.expires_at,
           scope = excluded.scope,
           updated_at = excluded.updated_at`
      )
      .run(
        credential.provider,
        credential.accessToken,
        credential.refreshToken,
        credential.expiresAt ? credential.expiresAt.toISOString() : null,
        credential.scope.join(" "),
        now,
        now
      );
  }
}
