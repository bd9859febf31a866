import { z } from "zod";
import type {
  CreatorInfo,
  TikTokOAuthError,
  TikTokTokenResponse,
  VideoInitData,
} from "../types/tiktok";
import type { PendingUpload } from "../types/upload";
import { ValidationError } from "./errors";

/**
 * /v2/oauth/token/ 成功レスポンス
 */
export const tokenResponseSchema: z.ZodType<TikTokTokenResponse> = z.object({
  open_id: z.string().min(1),
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_in: z.number().optional(),
  refresh_expires_in: z.number().optional(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
});

/**
 * エラーフィールドを持つ OAuth レスポンス
 */
export const oauthErrorSchema: z.ZodType<TikTokOAuthError> = z.object({
  error: z.string().min(1),
  error_description: z.string().optional(),
  log_id: z.string().optional(),
});

const privacyLevelSchema = z.enum([
  "PUBLIC_TO_EVERYONE",
  "MUTUAL_FOLLOW_FRIENDS",
  "FOLLOWER_OF_CREATOR",
  "SELF_ONLY",
]);

export const creatorInfoSchema: z.ZodType<CreatorInfo> = z.object({
  creator_avatar_url: z.string().nullish(),
  creator_username: z.string().nullish(),
  creator_nickname: z.string().nullish(),
  privacy_level_options: z.array(privacyLevelSchema).nullish(),
  comment_disabled: z.boolean().nullish(),
  duet_disabled: z.boolean().nullish(),
  stitch_disabled: z.boolean().nullish(),
  max_video_post_duration_sec: z.number().nullish(),
});

export const videoInitDataSchema: z.ZodType<VideoInitData> = z.object({
  publish_id: z.string(),
  upload_url: z.string().url(),
});

export const pendingUploadSchema: z.ZodType<
  PendingUpload,
  z.ZodTypeDef,
  unknown
> = z.object({
  video_path: z.string().min(1),
  user_id: z.string().min(1),
  description: z.string(),
  tags: z.array(z.string()).default([]),
});

/**
 * アップロード待ちリストのエントリを検証
 */
export function parsePendingUpload(entry: unknown): PendingUpload {
  const result = pendingUploadSchema.safeParse(entry);
  if (!result.success) {
    throw new ValidationError(
      `Invalid pending upload entry: ${result.error.issues
        .map((issue) => `${issue.path.join(".")} ${issue.message}`)
        .join(", ")}`
    );
  }
  return result.data;
}
