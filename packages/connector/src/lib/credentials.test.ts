import { describe, expect, it, vi } from "vitest";
import {
  CachedCredentials,
  extractAuthorizationCode,
  toAuthError,
  withAccessToken,
  type AccessToken,
} from "./credentials.js";
import { ApiError, AuthError, TransientNetworkError } from "./errors.js";
import { setupLogger } from "./logger.js";

class CountingCredentials extends CachedCredentials {
  refreshes = 0;

  constructor(clock: { now: Date }) {
    super(setupLogger("test-credentials"), () => clock.now);
  }

  protected async refresh(): Promise<AccessToken> {
    this.refreshes++;
    return { token: `token-${this.refreshes}`, expiresAt: this.expiresIn(3600) };
  }
}

const unauthorized = (error: unknown): boolean => error instanceof ApiError && error.statusCode === 401;

describe("CachedCredentials", () => {
  it("should reuse a token until five minutes before expiry", async () => {
    const clock = { now: new Date("2026-10-19T12:00:00Z") };
    const credentials = new CountingCredentials(clock);

    expect((await credentials.getAccessToken()).token).toBe("token-1");

    clock.now = new Date("2026-10-19T12:54:00Z");
    expect((await credentials.getAccessToken()).token).toBe("token-1");

    clock.now = new Date("2026-10-19T12:55:00Z");
    const refreshed = await credentials.getAccessToken();
    expect(refreshed).toEqual({ token: "token-2", expiresAt: new Date("2026-10-19T13:55:00Z") });
  });

  it("should refresh on demand", async () => {
    const credentials = new CountingCredentials({ now: new Date("2026-10-19T12:00:00Z") });

    await credentials.getAccessToken();
    const forced = await credentials.getAccessToken({ forceRefresh: true });

    expect(forced.token).toBe("token-2");
    expect(credentials.refreshes).toBe(2);
  });
});

describe("withAccessToken", () => {
  it("should replay once with a fresh token after a 401", async () => {
    const credentials = new CountingCredentials({ now: new Date("2026-10-19T12:00:00Z") });
    const call = vi.fn(async (token: string) => {
      if (token === "token-1") {
        throw new ApiError(401, "expired");
      }
      return `ok with ${token}`;
    });

    await expect(withAccessToken(credentials, call, unauthorized)).resolves.toBe("ok with token-2");
    expect(call).toHaveBeenCalledTimes(2);
  });

  it("should give up when the replay is unauthorized too", async () => {
    const credentials = new CountingCredentials({ now: new Date("2026-10-19T12:00:00Z") });
    const call = vi.fn(async (): Promise<string> => {
      throw new ApiError(401, "revoked");
    });

    await expect(withAccessToken(credentials, call, unauthorized)).rejects.toThrow("HTTP 401: revoked");
    expect(call).toHaveBeenCalledTimes(2);
  });

  it("should not replay other failures", async () => {
    const credentials = new CountingCredentials({ now: new Date("2026-10-19T12:00:00Z") });
    const call = vi.fn(async (): Promise<string> => {
      throw new ApiError(403, "forbidden");
    });

    await expect(withAccessToken(credentials, call, unauthorized)).rejects.toThrow("HTTP 403: forbidden");
    expect(call).toHaveBeenCalledTimes(1);
    expect(credentials.refreshes).toBe(1);
  });
});

describe("toAuthError", () => {
  it("should prefer the OAuth error description", () => {
    const error = toAuthError("Refresh", new ApiError(400, '{"error":"invalid_grant","error_description":"Bad grant"}'));

    expect(error).toBeInstanceOf(AuthError);
    expect(error.message).toBe("Refresh failed: Bad grant");
  });

  it("should fall back to the error code, then the status", () => {
    expect(toAuthError("Refresh", new ApiError(401, '{"error":"invalid_client"}')).message).toBe(
      "Refresh failed: invalid_client"
    );
    expect(toAuthError("Refresh", new ApiError(400, "<html>Bad Request</html>")).message).toBe(
      "Refresh failed: HTTP 400"
    );
  });

  it("should keep transient failures as they are", () => {
    const transient = new TransientNetworkError("Network error: fetch failed");

    expect(toAuthError("Refresh", transient)).toBe(transient);
  });

  it("should describe other failures", () => {
    expect(toAuthError("Refresh", new Error("socket hang up")).message).toBe("Refresh failed: socket hang up");
  });
});

describe("extractAuthorizationCode", () => {
  it("should extract the code from the redirect url", () => {
    expect(extractAuthorizationCode(" http://localhost/?code=abc&scope=calendar\n")).toBe("abc");
  });

  it("should reject denied or malformed redirects", () => {
    expect(() =>
      extractAuthorizationCode("http://localhost/?error=access_denied&error_description=User+declined")
    ).toThrow("Authorization denied: access_denied (User declined)");
    expect(() => extractAuthorizationCode("http://localhost/?state=1")).toThrow(
      "Redirect URL carries no authorization code"
    );
    expect(() => extractAuthorizationCode("not a url")).toThrow("Not a URL: not a url");
  });
});
