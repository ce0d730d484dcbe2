import type { CalendarProvider } from "../calendar/CalendarAdapter.js";
import { describeError } from "../errors.js";
import type { Credential, CredentialRepository } from "./CredentialStore.js";
import type { TokenRefresher } from "./tokenRefreshers.js";

export interface CredentialSource {
  validCredential(provider: CalendarProvider): Promise<Credential | null>;
}

export interface CredentialProviderOptions {
  store: CredentialRepository;
  refreshers: Partial<Record<CalendarProvider, TokenRefresher>>;
  now?: () => Date;
}

function isExpired(credential: Credential, now: Date) {
  return credential.expiresAt !== null && now.getTime() >= credential.expiresAt.getTime();
}

/**
 * Hands out usable provider credentials, refreshing expired ones. Every
 * failure degrades to `null` ("not connected"); nothing is thrown.
 */
export class CredentialProvider implements CredentialSource {
  private store: CredentialRepository;
  private refreshers: Partial<Record<CalendarProvider, TokenRefresher>>;
  private now: () => Date;
  // One refresh per provider at a time; rotated refresh tokens are single-use.
  private inflightRefreshes = new Map<CalendarProvider, Promise<Credential | null>>();

  constructor(options: CredentialProviderOptions) {
    this.store = options.store;
    this.refreshers = options.refreshers;
    this.now = options.now ?? (() => new Date());
  }

  async validCredential(provider: CalendarProvider): Promise<Credential | null> {
    const stored = this.store.get(provider);
    if (!stored) {
      return null;
    }
    if (!isExpired(stored, this.now())) {
      return stored;
    }
    if (!stored.refreshToken) {
      console.log("🔑 credential expired without refresh token", { provider });
      return null;
    }

    const inflight = this.inflightRefreshes.get(provider);
    if (inflight) {
      return await inflight;
    }

    const refreshPromise = this.refresh(stored, stored.refreshToken).finally(() => {
      this.inflightRefreshes.delete(provider);
    });
    this.inflightRefreshes.set(provider, refreshPromise);
    return await refreshPromise;
  }

  private async refresh(stored: Credential, refreshToken: string): Promise<Credential | null> {
    const refresher = this.refreshers[stored.provider];
    if (!refresher) {
      console.log("🔑 no refresher configured", { provider: stored.provider });
      return null;
    }

    try {
      const refreshed = await refresher.refresh(refreshToken);
      const credential: Credential = {
        provider: stored.provider,
        accessToken: refreshed.accessToken,
        refreshToken: refreshed.refreshToken || refreshToken,
        expiresAt: refreshed.expiresAt,
        scope: refreshed.scope ?? stored.scope,
      };
      this.store.save(credential);
      console.log("🔑 credential refreshed", {
        provider: stored.provider,
        expiresAt: credential.expiresAt?.toISOString(),
      });
      return credential;
    } catch (error) {
      console.error("🔑 credential refresh failed", {
        provider: stored.provider,
        error: describeError(error),
      });
      return null;
    }
  }
}
