import { describe, expect, it } from "vitest";
import { TokenRefreshService } from "./tokenRefreshService";
import { TikTokAuthService } from "./tiktokAuthService";
import { MemoryTokenStore } from "../libs/tokenStore";
import { createTestBindings } from "../testing/bindings";
import { createFetchStub, formBody, jsonResponse } from "../testing/fetchStub";
import type { TokenRecord } from "../types/token";

const NOW = new Date("2026-06-01T12:00:00.000Z");

function record(
  openId: string,
  expiresAt: string | undefined,
  refreshExpiresAt: string | undefined
): TokenRecord {
  return {
    open_id: openId,
    access_token: `access-${openId}`,
    refresh_token: `refresh-${openId}`,
    expires_in: 86400,
    refresh_expires_in: 31536000,
    expires_in_datetime: expiresAt,
    refresh_expires_in_datetime: refreshExpiresAt,
  };
}

const PAST = "2026-06-01T11:00:00.000Z";
const FUTURE = "2026-06-01T13:00:00.000Z";

describe("TokenRefreshService.decide", () => {
  const service = new TokenRefreshService(createTestBindings());

  it("refreshes when the access token expired and the refresh token is valid", () => {
    expect(service.decide(record("a", PAST, FUTURE), NOW)).toBe("refresh");
  });

  it("treats the exact access expiry instant as expired", () => {
    expect(service.decide(record("a", NOW.toISOString(), FUTURE), NOW)).toBe("refresh");
  });

  it("leaves a valid access token alone", () => {
    expect(service.decide(record("a", FUTURE, FUTURE), NOW)).toBe("valid");
  });

  it("requires re-authorization once the refresh token expired", () => {
    expect(service.decide(record("a", PAST, PAST), NOW)).toBe("reauthorize");
    expect(service.decide(record("a", PAST, NOW.toISOString()), NOW)).toBe("reauthorize");
  });

  it("cannot decide without both expiry timestamps", () => {
    expect(service.decide(record("a", undefined, FUTURE), NOW)).toBe("unknown");
    expect(service.decide(record("a", PAST, undefined), NOW)).toBe("unknown");
  });
});

describe("TokenRefreshService.checkAndRefreshTokens", () => {
  it("refreshes only eligible users and overwrites their records", async () => {
    const store = new MemoryTokenStore([
      record("expired-access", PAST, FUTURE),
      record("still-valid", FUTURE, FUTURE),
      record("needs-login", PAST, PAST),
      record("no-dates", undefined, undefined),
    ]);
    const stub = createFetchStub(() =>
      jsonResponse({
        open_id: "expired-access",
        access_token: "access-new",
        refresh_token: "refresh-new",
        expires_in: 3600,
        refresh_expires_in: 7200,
        token_type: "Bearer",
      })
    );
    const service = new TokenRefreshService(
      createTestBindings({ TOKEN_STORE: store, fetch: stub.fetch })
    );

    const result = await service.checkAndRefreshTokens(NOW);

    expect(result).toEqual({
      total: 4,
      refreshed: 1,
      skipped: 2,
      expired: 1,
      failed: 0,
      errors: [],
    });

    expect(stub.requests).toHaveLength(1);
    expect(stub.requests[0].url).toBe(TikTokAuthService.TOKEN_URL);
    expect(stub.requests[0].method).toBe("POST");
    expect(Object.fromEntries(formBody(stub.requests[0]))).toEqual({
      client_key: "test-client-key",
      client_secret: "test-secret",
      grant_type: "refresh_token",
      refresh_token: "refresh-expired-access",
    });

    expect(await store.get("expired-access")).toEqual({
      open_id: "expired-access",
      access_token: "access-new",
      refresh_token: "refresh-new",
      expires_in: 3600,
      refresh_expires_in: 7200,
      expires_in_datetime: "2026-06-01T13:00:00.000Z",
      refresh_expires_in_datetime: "2026-06-01T14:00:00.000Z",
      token_type: "Bearer",
    });
    expect(await store.get("still-valid")).toEqual(record("still-valid", FUTURE, FUTURE));
    expect(await store.get("needs-login")).toEqual(record("needs-login", PAST, PAST));
  });

  it("records a failed refresh and keeps the old token", async () => {
    const store = new MemoryTokenStore([record("user-1", PAST, FUTURE)]);
    const stub = createFetchStub(() =>
      jsonResponse({ error: "invalid_grant", error_description: "Refresh token is invalid" })
    );
    const service = new TokenRefreshService(
      createTestBindings({ TOKEN_STORE: store, fetch: stub.fetch })
    );

    const result = await service.checkAndRefreshTokens(NOW);

    expect(result.failed).toBe(1);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({
      openId: "user-1",
      error:
        "Failed to refresh token: invalid_grant: Refresh token is invalid",
    });
    expect(await store.get("user-1")).toEqual(record("user-1", PAST, FUTURE));
  });

  it("records a non-200 response as a failure", async () => {
    const store = new MemoryTokenStore([record("user-1", PAST, FUTURE)]);
    const stub = createFetchStub(() => new Response("server error", { status: 500 }));
    const service = new TokenRefreshService(
      createTestBindings({ TOKEN_STORE: store, fetch: stub.fetch })
    );

    const result = await service.checkAndRefreshTokens(NOW);

    expect(result.errors[0].error).toBe(
      "Failed to refresh token: server error"
    );
  });
});
