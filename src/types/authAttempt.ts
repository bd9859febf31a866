/**
 * 認可リクエスト 1 回分の一時データ
 * Key: state:{state}
 * TTL: 600秒
 */
export interface AuthorizationAttempt {
  codeVerifier: string;
  createdAt: number; // Unix timestamp (ms)
  expiresAt: number; // Unix timestamp (ms)
}

/**
 * ストアのキー生成ヘルパー
 */
export const AttemptKeys = {
  oauthState: (state: string) => `state:${state}`,
} as const;
