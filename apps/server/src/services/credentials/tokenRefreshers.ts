import axios, { type AxiosInstance } from "axios";
import { google } from "googleapis";
import { z } from "zod";

export interface RefreshedToken {
  accessToken: string;
  /** Present when the provider rotated the refresh token. */
  refreshToken?: string | null;
  expiresAt: Date | null;
  scope?: string[];
}

export interface TokenRefresher {
  refresh(refreshToken: string): Promise<RefreshedToken>;
}

function requireConfig(value: string | undefined, name: string): string {
  if (!value) {
    throw new Error(`${name} is missing`);
  }
  return value;
}

export interface GoogleOAuthConfig {
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
}

export class GoogleTokenRefresher implements TokenRefresher {
  constructor(private config: GoogleOAuthConfig) {}

  async refresh(refreshToken: string): Promise<RefreshedToken> {
    const clientId = requireConfig(this.config.clientId, "GOOGLE_CLIENT_ID");
    const clientSecret = requireConfig(this.config.clientSecret, "GOOGLE_CLIENT_SECRET");

    const oauth2Client = new google.auth.OAuth2(clientId, clientSecret, this.config.redirectUri);
    oauth2Client.setCredentials({ refresh_token: refreshToken });

    // No access token is set, so this always goes to the token endpoint.
    const { token } = await oauth2Client.getAccessToken();
    if (!token) {
      throw new Error("Google token refresh returned no access token");
    }

    const credentials = oauth2Client.credentials;
    return {
      accessToken: token,
      refreshToken: credentials.refresh_token ?? null,
      expiresAt: credentials.expiry_date ? new Date(credentials.expiry_date) : null,
      scope: credentials.scope ? credentials.scope.split(" ") : undefined,
    };
  }
}

export const MICROSOFT_SCOPES = [
  "https://graph.microsoft.com/Calendars.ReadWrite",
  "https://graph.microsoft.com/User.Read",
  "offline_access",
];

const MicrosoftTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().optional(),
  expires_in: z.coerce.number().positive().optional(),
  scope: z.string().optional(),
});

export interface MicrosoftOAuthConfig {
  clientId?: string;
  clientSecret?: string;
  tenantId: string;
  http?: AxiosInstance;
  now?: () => Date;
}

export class MicrosoftTokenRefresher implements TokenRefresher {
  private http: AxiosInstance;
  private now: () => Date;

  constructor(private config: MicrosoftOAuthConfig) {
    this.http = config.http ?? axios.create();
    this.now = config.now ?? (() => new Date());
  }

  async refresh(refreshToken: string): Promise<RefreshedToken> {
    const clientId = requireConfig(this.config.clientId, "MICROSOFT_CLIENT_ID");
    const clientSecret = requireConfig(this.config.clientSecret, "MICROSOFT_CLIENT_SECRET");

    const body = new URLSearchParams({
      client_id: clientId,
      client_secret: clientSecret,
      grant_type: "refresh_token",
      refresh_token: refreshToken,
      scope: MICROSOFT_SCOPES.join(" "),
    });

    const response = await this.http.post(
      `https://login.microsoftonline.com/${this.config.tenantId}/oauth2/v2.0/token`,
      body.toString(),
      { headers: { "Content-Type": "application/x-www-form-urlencoded" } }
    );

    const parsed = MicrosoftTokenResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error("Malformed Microsoft token response");
    }

    const expiresInSeconds = parsed.data.expires_in ?? 3600;
    return {
      accessToken: parsed.data.access_token,
      refreshToken: parsed.data.refresh_token ?? null,
      expiresAt: new Date(this.now().getTime() + expiresInSeconds * 1000),
      scope: parsed.data.scope ? parsed.data.scope.split(" ") : undefined,
    };
  }
}
