/**
 * OAuth credential providers
 *
 * A provider hands out access tokens and refreshes them transparently when
 * they are about to expire. A rejected refresh is fatal (AuthError): a run
 * never continues without authentication.
 */

import { z } from "zod";
import { ApiError, AuthError, TransientNetworkError } from "./errors.js";
import type { Logger } from "./logger.js";

const DEFAULT_THRESHOLD_MINUTES = 5;

export interface AccessToken {
  token: string;
  expiresAt: Date;
}

export interface TokenRequestOptions {
  /** Ignore the cached token (e.g. after a 401) */
  forceRefresh?: boolean;
}

export interface CredentialProvider {
  getAccessToken(options?: TokenRequestOptions): Promise<AccessToken>;
}

export type Clock = () => Date;

const errorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export const systemClock: Clock = () => new Date();

/**
 * Caching base class: subclasses implement `refresh()` against their token endpoint.
 */
export abstract class CachedCredentials implements CredentialProvider {
  private cached: AccessToken | null = null;
  protected readonly now: Clock;
  protected readonly logger: Logger;

  protected constructor(logger: Logger, now: Clock = systemClock) {
    this.logger = logger;
    this.now = now;
  }

  async getAccessToken(options: TokenRequestOptions = {}): Promise<AccessToken> {
    if (!options.forceRefresh && this.cached !== null) {
      const minutesUntilExpiry = (this.cached.expiresAt.getTime() - this.now().getTime()) / 1000 / 60;
      if (minutesUntilExpiry > DEFAULT_THRESHOLD_MINUTES) {
        this.logger.debug(`Using cached token (${Math.round(minutesUntilExpiry)} min until expiry)`);
        return this.cached;
      }
    }

    this.logger.debug("Refreshing access token...");
    this.cached = await this.refresh();
    this.logger.debug(`Token refreshed (expires: ${this.cached.expiresAt.toISOString()})`);
    return this.cached;
  }

  /** Remember a token obtained outside `refresh()` (e.g. from an authorization code) */
  protected remember(token: AccessToken): AccessToken {
    this.cached = token;
    return token;
  }

  protected expiresIn(seconds: number): Date {
    return new Date(this.now().getTime() + seconds * 1000);
  }

  protected abstract refresh(): Promise<AccessToken>;
}

/**
 * Run `call` with a token; on a 401 force one refresh and replay once.
 */
export async function withAccessToken<T>(
  credentials: CredentialProvider,
  call: (token: string) => Promise<T>,
  isUnauthorized: (error: unknown) => boolean
): Promise<T> {
  const { token } = await credentials.getAccessToken();
  try {
    return await call(token);
  } catch (error) {
    if (!isUnauthorized(error)) {
      throw error;
    }
    const refreshed = await credentials.getAccessToken({ forceRefresh: true });
    return call(refreshed.token);
  }
}

/**
 * Turn a token endpoint failure into an AuthError with the provider's explanation.
 * Transient failures that outlasted the retry policy keep their class.
 */
export function toAuthError(action: string, error: unknown): AuthError | TransientNetworkError {
  if (error instanceof TransientNetworkError) {
    return error;
  }
  if (error instanceof ApiError) {
    let body: unknown = null;
    try {
      body = JSON.parse(error.body);
    } catch {
      body = null;
    }
    const parsed = errorResponseSchema.safeParse(body);
    const detail = parsed.success ? (parsed.data.error_description ?? parsed.data.error) : `HTTP ${error.statusCode}`;
    return new AuthError(`${action} failed: ${detail}`, { cause: error });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new AuthError(`${action} failed: ${reason}`, { cause: error });
}

/**
 * Pull the authorization code out of the URL the browser was redirected to.
 */
export function extractAuthorizationCode(redirectUrl: string): string {
  let url: URL;
  try {
    url = new URL(redirectUrl.trim());
  } catch {
    throw new AuthError(`Not a URL: ${redirectUrl}`);
  }
  const error = url.searchParams.get("error");
  if (error) {
    const description = url.searchParams.get("error_description");
    throw new AuthError(`Authorization denied: ${error}${description ? ` (${description})` : ""}`);
  }
  const code = url.searchParams.get("code");
  if (!code) {
    throw new AuthError("Redirect URL carries no authorization code");
  }
  return code;
}
