import type { Bindings } from "../types/bindings";
import type { TokenRecord } from "../types/token";
import type { RefreshResult } from "../types/scheduled";
import { getAppLogger } from "../logger";
import { errorMessage } from "../utils/errors";
import { TikTokAuthService } from "./tiktokAuthService";
import { TokenService } from "./tokenService";

const logger = getAppLogger("refresh");

export type RefreshDecision = "refresh" | "valid" | "reauthorize" | "unknown";

/**
 * トークンリフレッシュサービス
 */
export class TokenRefreshService {
  private tokenService: TokenService;
  private authService: TikTokAuthService;

  constructor(private env: Bindings) {
    this.tokenService = new TokenService(env);
    this.authService = new TikTokAuthService(env);
  }

  /**
   * リフレッシュが必要かを判定
   * アクセストークンが期限切れ、かつリフレッシュトークンが有効な場合のみ refresh
   */
  decide(record: TokenRecord, now: Date = new Date()): RefreshDecision {
    const accessExpired = this.tokenService.isAccessTokenExpired(record, now);
    const refreshExpired = this.tokenService.isRefreshTokenExpired(record, now);

    if (accessExpired === null || refreshExpired === null) {
      return "unknown";
    }
    if (!accessExpired) {
      return "valid";
    }
    return refreshExpired ? "reauthorize" : "refresh";
  }

  /**
   * 特定ユーザーのトークンをリフレッシュして上書き保存
   */
  async refreshToken(record: TokenRecord, now: Date = new Date()): Promise<TokenRecord> {
    const response = await this.authService.refreshAccessToken(
      record.refresh_token
    );
    return await this.tokenService.saveTokenData(response, record.open_id, now);
  }

  /**
   * 全ユーザーのトークンを確認し、期限切れのものをリフレッシュ
   * 失敗はログに記録して次のユーザーへ進む
   */
  async checkAndRefreshTokens(now: Date = new Date()): Promise<RefreshResult> {
    const records = await this.env.TOKEN_STORE.list();

    const result: RefreshResult = {
      total: records.length,
      refreshed: 0,
      skipped: 0,
      expired: 0,
      failed: 0,
      errors: [],
    };

    for (const record of records) {
      const openId = record.open_id;

      switch (this.decide(record, now)) {
        case "valid":
          result.skipped++;
          break;

        case "unknown":
          result.skipped++;
          logger.warn("Missing expiry timestamps for user {openId}.", {
            openId,
          });
          break;

        case "reauthorize":
          result.expired++;
          logger.info(
            "Refresh token expired for user {openId}. Re-authentication required.",
            { openId }
          );
          break;

        case "refresh":
          try {
            await this.refreshToken(record, now);
            result.refreshed++;
            logger.info("Token refreshed successfully for user {openId}", {
              openId,
            });
          } catch (error) {
            result.failed++;
            result.errors.push({
              openId,
              error: errorMessage(error),
              timestamp: new Date().toISOString(),
            });
            logger.error("Failed to refresh token for user {openId}: {error}", {
              openId,
              error: errorMessage(error),
            });
          }
          break;
      }
    }

    return result;
  }
}
