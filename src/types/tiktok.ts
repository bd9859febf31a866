/**
 * TikTok API の型定義
 * @see https://developers.tiktok.com/doc/oauth-user-access-token-management/
 * @see https://developers.tiktok.com/doc/content-posting-api-reference-direct-post/
 */

/**
 * /v2/oauth/token/ 成功レスポンス
 */
export interface TikTokTokenResponse {
  open_id: string;
  access_token: string;
  refresh_token: string;
  expires_in?: number;
  refresh_expires_in?: number;
  scope?: string;
  token_type?: string;
}

/**
 * /v2/oauth/token/ エラーレスポンス（HTTP 200 で返ることもある）
 */
export interface TikTokOAuthError {
  error: string;
  error_description?: string;
  log_id?: string;
}

export type PrivacyLevel =
  | "PUBLIC_TO_EVERYONE"
  | "MUTUAL_FOLLOW_FRIENDS"
  | "FOLLOWER_OF_CREATOR"
  | "SELF_ONLY";

/**
 * creator_info/query の data
 */
export interface CreatorInfo {
  creator_avatar_url?: string | null;
  creator_username?: string | null;
  creator_nickname?: string | null;
  privacy_level_options?: PrivacyLevel[] | null;
  comment_disabled?: boolean | null;
  duet_disabled?: boolean | null;
  stitch_disabled?: boolean | null;
  max_video_post_duration_sec?: number | null;
}

/**
 * video/init の post_info
 */
export interface PostInfo {
  title: string;
  privacy_level: PrivacyLevel;
  disable_duet: boolean;
  disable_comment: boolean;
  disable_stitch: boolean;
  brand_content_toggle: boolean;
  brand_organic_toggle: boolean;
  is_aigc: boolean;
  video_cover_timestamp_ms?: number;
}

/**
 * video/init の source_info（FILE_UPLOAD）
 */
export interface FileUploadSourceInfo {
  source: "FILE_UPLOAD";
  video_size: number;
  chunk_size: number;
  total_chunk_count: number;
}

/**
 * video/init の data
 */
export interface VideoInitData {
  publish_id: string;
  upload_url: string;
}
