import { describe, expect, it } from "vitest";
import { MemoryAuthorizationAttemptStore } from "./authAttemptStore";

describe("MemoryAuthorizationAttemptStore", () => {
  it("returns the verifier once and then forgets the state", async () => {
    const store = new MemoryAuthorizationAttemptStore();
    await store.put("state-1", "verifier-1");

    expect(await store.take("state-1")).toMatchObject({ codeVerifier: "verifier-1" });
    expect(await store.take("state-1")).toBeNull();
  });

  it("does not return an attempt for an unknown state", async () => {
    const store = new MemoryAuthorizationAttemptStore();
    await store.put("state-1", "verifier-1");

    expect(await store.take("state-2")).toBeNull();
  });

  it("expires attempts after the TTL", async () => {
    let now = 1_000_000;
    const store = new MemoryAuthorizationAttemptStore(600, () => now);

    const attempt = await store.put("state-1", "verifier-1");
    expect(attempt).toEqual({
      codeVerifier: "verifier-1",
      createdAt: 1_000_000,
      expiresAt: 1_600_000,
    });

    now = 1_600_000;
    expect(await store.take("state-1")).toBeNull();
  });

  it("drops expired attempts when a new one is stored", async () => {
    let now = 0;
    const store = new MemoryAuthorizationAttemptStore(10, () => now);
    await store.put("old", "verifier-old");

    now = 20_000;
    await store.put("new", "verifier-new");

    expect(store.size).toBe(1);
  });
});
