import { describe, expect, it } from "vitest";
import { TokenService } from "./tokenService";
import { MemoryTokenStore } from "../libs/tokenStore";
import { createTestBindings } from "../testing/bindings";
import { NotFoundError } from "../utils/errors";

const NOW = new Date("2026-01-01T00:00:00.000Z");

describe("TokenService.saveTokenData", () => {
  it("derives absolute expiries from the relative seconds", async () => {
    const store = new MemoryTokenStore();
    const service = new TokenService(createTestBindings({ TOKEN_STORE: store }));

    const record = await service.saveTokenData(
      {
        open_id: "user-1",
        access_token: "access-1",
        refresh_token: "refresh-1",
        expires_in: 86400,
        refresh_expires_in: 31536000,
        scope: "user.info.basic,video.publish,video.upload",
        token_type: "Bearer",
      },
      "user-1",
      NOW
    );

    expect(record).toEqual({
      open_id: "user-1",
      access_token: "access-1",
      refresh_token: "refresh-1",
      expires_in: 86400,
      refresh_expires_in: 31536000,
      expires_in_datetime: "2026-01-02T00:00:00.000Z",
      refresh_expires_in_datetime: "2027-01-01T00:00:00.000Z",
      scope: "user.info.basic,video.publish,video.upload",
      token_type: "Bearer",
    });
    expect(await store.get("user-1")).toEqual(record);
  });

  it("still saves when the relative fields are missing", async () => {
    const store = new MemoryTokenStore();
    const service = new TokenService(createTestBindings({ TOKEN_STORE: store }));

    await service.saveTokenData(
      { open_id: "user-1", access_token: "access-1", refresh_token: "refresh-1" },
      "user-1",
      NOW
    );

    const saved = await store.get("user-1");
    expect(saved).toEqual({
      open_id: "user-1",
      access_token: "access-1",
      refresh_token: "refresh-1",
    });
  });

  it("keys the record by the given open_id", async () => {
    const store = new MemoryTokenStore();
    const service = new TokenService(createTestBindings({ TOKEN_STORE: store }));

    await service.saveTokenData(
      { open_id: "from-response", access_token: "a", refresh_token: "r", expires_in: 60 },
      "user-1",
      NOW
    );

    expect((await store.get("user-1"))?.open_id).toBe("user-1");
    expect(await store.get("from-response")).toBeNull();
  });
});

describe("TokenService.getAccessToken", () => {
  it("returns the stored access token", async () => {
    const service = new TokenService(
      createTestBindings({
        TOKEN_STORE: new MemoryTokenStore([
          { open_id: "user-1", access_token: "access-1", refresh_token: "refresh-1" },
        ]),
      })
    );

    await expect(service.getAccessToken("user-1")).resolves.toBe("access-1");
  });

  it("fails for an unknown user", async () => {
    const service = new TokenService(createTestBindings());

    await expect(service.getAccessToken("ghost")).rejects.toBeInstanceOf(NotFoundError);
  });
});
