import type { TokenStore } from "../libs/tokenStore";
import type { AuthorizationAttemptStore } from "../libs/authAttemptStore";
import type { ChallengeEncoding } from "../libs/pkce";

/**
 * サーバー・ジョブ共通の環境変数とバインディング
 */
export interface Bindings {
  // トークンファイル
  TOKEN_STORE: TokenStore;

  // 認可リクエスト 1 回分の state
  AUTH_ATTEMPTS: AuthorizationAttemptStore;

  // 環境変数
  TIKTOK_CLIENT_KEY: string;
  TIKTOK_CLIENT_SECRET: string;
  TIKTOK_REDIRECT_URI: string;

  // オプション
  MAX_RETRIES?: number;
  CODE_CHALLENGE_ENCODING?: ChallengeEncoding;
  fetch?: typeof fetch; // テスト用に差し替え可能
}

/**
 * Hono コンテキストの型定義
 */
export type HonoEnv = {
  Bindings: Bindings;
  Variables: Variables;
};

/**
 * Hono Variables（リクエストスコープの変数）
 */
export interface Variables {
  requestId?: string;
  startTime?: number;
}
