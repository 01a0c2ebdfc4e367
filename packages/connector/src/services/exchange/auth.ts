/**
 * Office 365 OAuth 2.0
 *
 * Refresh-token flow against the Azure AD v1 token endpoint for the Exchange
 * Online resource, plus the pieces of the interactive authorization-code
 * flow used by the exchange-oauth helper.
 *
 * Config file (o365_oauth.json):
 * { "client_id": "...", "tenant_id": "...", "email_address": "...", "refresh_token": "..." }
 * The refresh token is rotated on every refresh and written back to the file.
 */

import { z } from "zod";
import { ConfigFile } from "../../lib/config-file.js";
import { CachedCredentials, type AccessToken, type Clock, systemClock, toAuthError } from "../../lib/credentials.js";
import { AuthError } from "../../lib/errors.js";
import type { HttpClient } from "../../lib/http.js";
import { setupLogger } from "../../lib/logger.js";

const logger = setupLogger("o365-oauth");

export const EXCHANGE_SERVER = "outlook.office365.com";
export const EXCHANGE_RESOURCE = `https://${EXCHANGE_SERVER}`;
export const REDIRECT_URI = "https://login.microsoftonline.com/common/oauth2/nativeclient";
const LOGIN_BASE = "https://login.microsoftonline.com";

export const exchangeConfigSchema = z
  .object({
    client_id: z.string().min(1),
    tenant_id: z.string().min(1),
    email_address: z.string().email(),
    refresh_token: z.string().min(1).optional(),
  })
  .passthrough();

export type ExchangeConfig = z.infer<typeof exchangeConfigSchema>;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  // v1 endpoint returns seconds as a string
  expires_in: z.coerce.number().positive(),
});

export function openExchangeConfig(path: string): ConfigFile<ExchangeConfig> {
  return new ConfigFile(path, exchangeConfigSchema);
}

export function tokenUrl(tenantId: string): string {
  return `${LOGIN_BASE}/${encodeURIComponent(tenantId)}/oauth2/token`;
}

/**
 * URL the user opens to grant access; the browser ends up on REDIRECT_URI?code=...
 */
export function authorizationUrl(config: ExchangeConfig): string {
  const params = new URLSearchParams({
    client_id: config.client_id,
    login_hint: config.email_address,
    response_type: "code",
    response_mode: "query",
    redirect_uri: REDIRECT_URI,
    resource: EXCHANGE_RESOURCE,
  });
  return `${LOGIN_BASE}/${encodeURIComponent(config.tenant_id)}/oauth2/authorize?${params.toString()}`;
}

export class ExchangeCredentials extends CachedCredentials {
  private readonly configFile: ConfigFile<ExchangeConfig>;
  private readonly http: HttpClient;

  constructor(configFile: ConfigFile<ExchangeConfig>, http: HttpClient, now: Clock = systemClock) {
    super(logger, now);
    this.configFile = configFile;
    this.http = http;
  }

  protected async refresh(): Promise<AccessToken> {
    const config = this.configFile.load();
    if (!config.refresh_token) {
      throw new AuthError(`No refresh_token in ${this.configFile.path}. Run exchange-oauth first.`);
    }
    return this.requestToken(config, "Office 365 token refresh", {
      grant_type: "refresh_token",
      client_id: config.client_id,
      refresh_token: config.refresh_token,
      redirect_uri: REDIRECT_URI,
      resource: EXCHANGE_RESOURCE,
    });
  }

  /**
   * Redeem an authorization code and store the resulting refresh token.
   */
  async exchangeCode(code: string): Promise<AccessToken> {
    const config = this.configFile.load();
    const token = await this.requestToken(config, "Office 365 authorization", {
      grant_type: "authorization_code",
      client_id: config.client_id,
      code,
      redirect_uri: REDIRECT_URI,
      resource: EXCHANGE_RESOURCE,
    });
    return this.remember(token);
  }

  private async requestToken(config: ExchangeConfig, action: string, form: Record<string, string>): Promise<AccessToken> {
    let data: unknown;
    try {
      data = await this.http.requestJson("POST", tokenUrl(config.tenant_id), {
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
    if (parsed.data.refresh_token && parsed.data.refresh_token !== config.refresh_token) {
      this.configFile.update({ refresh_token: parsed.data.refresh_token });
      logger.debug("Office 365 refresh token rotated");
    }
    return { token: parsed.data.access_token, expiresAt: this.expiresIn(parsed.data.expires_in) };
  }
}
