/**
 * トークンファイルに保存するレコード型
 * Key: open_id
 */
export interface TokenRecord {
  open_id: string; // 主キー
  access_token: string;
  refresh_token: string;
  expires_in?: number; // 秒
  refresh_expires_in?: number; // 秒
  expires_in_datetime?: string; // ISO 8601（保存時に算出）
  refresh_expires_in_datetime?: string; // ISO 8601（保存時に算出）
  scope?: string;
  token_type?: string;
}

/**
 * トークンファイル全体（open_id → TokenRecord）
 */
export type TokenFile = Record<string, TokenRecord>;
