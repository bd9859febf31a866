import type { Bindings } from "../types/bindings";
import type { TikTokTokenResponse } from "../types/tiktok";
import type { TokenRecord } from "../types/token";
import { getAppLogger } from "../logger";
import { NotFoundError } from "../utils/errors";

const logger = getAppLogger("tokens");

/**
 * トークン管理サービス
 */
export class TokenService {
  constructor(private env: Bindings) {}

  /**
   * トークンレスポンスを保存
   * 有効期限の絶対時刻はリクエスト時刻 + 相対秒数で算出する
   */
  async saveTokenData(
    response: TikTokTokenResponse,
    openId: string,
    now: Date = new Date()
  ): Promise<TokenRecord> {
    const record: TokenRecord = { ...response, open_id: openId };

    if (response.expires_in !== undefined) {
      record.expires_in_datetime = addSeconds(now, response.expires_in);
    } else {
      logger.warn("'expires_in' not found for user {openId}.", { openId });
    }

    if (response.refresh_expires_in !== undefined) {
      record.refresh_expires_in_datetime = addSeconds(
        now,
        response.refresh_expires_in
      );
    } else {
      logger.warn("'refresh_expires_in' not found for user {openId}.", {
        openId,
      });
    }

    await this.env.TOKEN_STORE.put(record);
    return record;
  }

  /**
   * 保存済みのアクセストークンを取得
   */
  async getAccessToken(openId: string): Promise<string> {
    const record = await this.env.TOKEN_STORE.get(openId);
    if (!record) {
      throw new NotFoundError(`No token stored for user ${openId}`);
    }
    return record.access_token;
  }

  /**
   * アクセストークンの有効期限切れ判定（期限不明は null）
   */
  isAccessTokenExpired(record: TokenRecord, now: Date = new Date()): boolean | null {
    return isPast(record.expires_in_datetime, now);
  }

  /**
   * リフレッシュトークンの有効期限切れ判定（期限不明は null）
   */
  isRefreshTokenExpired(record: TokenRecord, now: Date = new Date()): boolean | null {
    return isPast(record.refresh_expires_in_datetime, now);
  }
}

function addSeconds(date: Date, seconds: number): string {
  return new Date(date.getTime() + seconds * 1000).toISOString();
}

function isPast(isoDate: string | undefined, now: Date): boolean | null {
  if (!isoDate) return null;
  const time = new Date(isoDate).getTime();
  if (Number.isNaN(time)) return null;
  return now.getTime() >= time;
}
