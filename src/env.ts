import type { AppConfig } from "./config";
import type { Bindings } from "./types/bindings";
import { MemoryAuthorizationAttemptStore } from "./libs/authAttemptStore";
import { FileTokenStore } from "./libs/tokenStore";

/**
 * 設定からバインディングを組み立てる
 */
export function createBindings(
  config: AppConfig,
  overrides: Partial<Bindings> = {}
): Bindings {
  return {
    TOKEN_STORE: new FileTokenStore(config.tokenFile),
    AUTH_ATTEMPTS: new MemoryAuthorizationAttemptStore(),
    TIKTOK_CLIENT_KEY: config.clientKey,
    TIKTOK_CLIENT_SECRET: config.clientSecret,
    TIKTOK_REDIRECT_URI: config.redirectUri,
    MAX_RETRIES: config.maxRetries,
    CODE_CHALLENGE_ENCODING: config.codeChallengeEncoding,
    ...overrides,
  };
}
