/**
 * Google OAuth 2.0
 *
 * Refresh-token flow for an installed application, plus the authorization
 * URL / code exchange used by the google-oauth helper.
 *
 * Config file (google_oauth.json):
 * { "client_id": "...", "client_secret": "...", "scopes": ["..."], "refresh_token": "..." }
 */

import { z } from "zod";
import { ConfigFile } from "../../lib/config-file.js";
import { CachedCredentials, type AccessToken, type Clock, systemClock, toAuthError } from "../../lib/credentials.js";
import { AuthError } from "../../lib/errors.js";
import type { HttpClient } from "../../lib/http.js";
import { setupLogger } from "../../lib/logger.js";

const logger = setupLogger("google-oauth");

export const GOOGLE_AUTH_URI = "https://accounts.google.com/o/oauth2/auth";
export const GOOGLE_TOKEN_URI = "https://oauth2.googleapis.com/token";
export const REDIRECT_URI = "http://localhost";
export const CALENDAR_SCOPE = "https://www.googleapis.com/auth/calendar";
export const YOUTUBE_SCOPE = "https://www.googleapis.com/auth/youtube";

export const googleConfigSchema = z
  .object({
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
    scopes: z.array(z.string().min(1)).min(1).optional(),
    refresh_token: z.string().min(1).optional(),
  })
  .passthrough();

export type GoogleConfig = z.infer<typeof googleConfigSchema>;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
  refresh_token: z.string().min(1).optional(),
  scope: z.string().optional(),
});

export function openGoogleConfig(path: string): ConfigFile<GoogleConfig> {
  return new ConfigFile(path, googleConfigSchema);
}

export function configuredScopes(config: GoogleConfig): string[] {
  return config.scopes ?? [CALENDAR_SCOPE];
}

export function authorizationUrl(config: GoogleConfig): string {
  const params = new URLSearchParams({
    client_id: config.client_id,
    redirect_uri: REDIRECT_URI,
    response_type: "code",
    scope: configuredScopes(config).join(" "),
    access_type: "offline",
    prompt: "consent",
  });
  return `${GOOGLE_AUTH_URI}?${params.toString()}`;
}

export class GoogleCredentials extends CachedCredentials {
  private readonly configFile: ConfigFile<GoogleConfig>;
  private readonly http: HttpClient;
  private readonly requiredScopes: readonly string[];

  /**
   * @param requiredScopes - scopes the calling tool needs; refused up front when the config grants fewer
   */
  constructor(
    configFile: ConfigFile<GoogleConfig>,
    http: HttpClient,
    requiredScopes: readonly string[] = [],
    now: Clock = systemClock
  ) {
    super(logger, now);
    this.configFile = configFile;
    this.http = http;
    this.requiredScopes = requiredScopes;
  }

  protected async refresh(): Promise<AccessToken> {
    const config = this.configFile.load();
    const granted = configuredScopes(config);
    const missing = this.requiredScopes.filter((scope) => !granted.includes(scope));
    if (missing.length > 0) {
      throw new AuthError(`${this.configFile.path} lacks scope(s) ${missing.join(", ")}. Add them and run google-oauth.`);
    }
    if (!config.refresh_token) {
      throw new AuthError(`No refresh_token in ${this.configFile.path}. Run google-oauth first.`);
    }
    return this.requestToken("Google token refresh", {
      grant_type: "refresh_token",
      client_id: config.client_id,
      client_secret: config.client_secret,
      refresh_token: config.refresh_token,
    });
  }

  async exchangeCode(code: string): Promise<AccessToken> {
    const config = this.configFile.load();
    const token = await this.requestToken("Google authorization", {
      grant_type: "authorization_code",
      client_id: config.client_id,
      client_secret: config.client_secret,
      code,
      redirect_uri: REDIRECT_URI,
    });
    return this.remember(token);
  }

  private async requestToken(action: string, form: Record<string, string>): Promise<AccessToken> {
    let data: unknown;
    try {
      data = await this.http.requestJson("POST", GOOGLE_TOKEN_URI, {
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams(form),
        idempotent: true,
      });
    } catch (error) {
      throw toAuthError(action, error);
    }

    const parsed = tokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new AuthError(`${action} failed: unexpected token response`);
    }
    if (parsed.data.refresh_token) {
      this.configFile.update({ refresh_token: parsed.data.refresh_token });
      logger.debug("Google refresh token stored");
    }
    return { token: parsed.data.access_token, expiresAt: this.expiresIn(parsed.data.expires_in) };
  }
}
