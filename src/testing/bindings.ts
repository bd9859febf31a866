import type { Bindings } from "../types/bindings";
import { MemoryAuthorizationAttemptStore } from "../libs/authAttemptStore";
import { MemoryTokenStore } from "../libs/tokenStore";

/**
 * テスト用のバインディング
 */
export function createTestBindings(overrides: Partial<Bindings> = {}): Bindings {
  return {
    TOKEN_STORE: new MemoryTokenStore(),
    AUTH_ATTEMPTS: new MemoryAuthorizationAttemptStore(),
    TIKTOK_CLIENT_KEY: "test-client-key",
    TIKTOK_CLIENT_SECRET: "test-secret",
    TIKTOK_REDIRECT_URI: "http://localhost:8000/callback/",
    MAX_RETRIES: 2,
    ...overrides,
  };
}
