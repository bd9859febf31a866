import type { AuthorizationAttempt } from "../types/authAttempt";
import { AttemptKeys } from "../types/authAttempt";

/**
 * 認可リクエスト 1 回分の state を保持するストア
 */
export interface AuthorizationAttemptStore {
  put(state: string, codeVerifier: string): Promise<AuthorizationAttempt>;
  /** 取り出すと同時に削除する（一度しか使えない） */
  take(state: string): Promise<AuthorizationAttempt | null>;
}

/**
 * TTL 付きのインメモリストア
 */
export class MemoryAuthorizationAttemptStore
  implements AuthorizationAttemptStore
{
  static readonly DEFAULT_TTL_SECONDS = 600; // 10分

  private readonly attempts = new Map<string, AuthorizationAttempt>();

  constructor(
    private readonly ttlSeconds: number = MemoryAuthorizationAttemptStore.DEFAULT_TTL_SECONDS,
    private readonly now: () => number = Date.now
  ) {}

  async put(state: string, codeVerifier: string): Promise<AuthorizationAttempt> {
    this.purgeExpired();

    const createdAt = this.now();
    const attempt: AuthorizationAttempt = {
      codeVerifier,
      createdAt,
      expiresAt: createdAt + this.ttlSeconds * 1000,
    };
    this.attempts.set(AttemptKeys.oauthState(state), attempt);
    return attempt;
  }

  async take(state: string): Promise<AuthorizationAttempt | null> {
    const key = AttemptKeys.oauthState(state);
    const attempt = this.attempts.get(key);
    this.attempts.delete(key);

    if (!attempt || attempt.expiresAt <= this.now()) {
      return null;
    }
    return attempt;
  }

  get size(): number {
    return this.attempts.size;
  }

  private purgeExpired(): void {
    const now = this.now();
    for (const [key, attempt] of this.attempts) {
      if (attempt.expiresAt <= now) this.attempts.delete(key);
    }
  }
}
