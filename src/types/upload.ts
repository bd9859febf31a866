import type { PrivacyLevel } from "./tiktok";

/**
 * アップロード待ちリストの 1 エントリ
 */
export interface PendingUpload {
  video_path: string;
  user_id: string;
  description: string;
  tags: string[];
}

/**
 * video/init に渡す投稿オプション（未指定はデフォルト値）
 */
export interface PostOptions {
  privacy_level?: PrivacyLevel;
  disable_duet?: boolean;
  disable_comment?: boolean;
  disable_stitch?: boolean;
  video_cover_timestamp_ms?: number;
  brand_content_toggle?: boolean;
  brand_organic_toggle?: boolean;
  is_aigc?: boolean;
}

/**
 * 1 回の uploadVideo 呼び出しに閉じたアップロードセッション
 */
export interface UploadSession {
  uploadUrl: string;
  chunkSize: number;
  totalChunkCount: number;
  videoSize: number;
}

/**
 * チャンクのバイト範囲（end は inclusive）
 */
export interface ChunkRange {
  index: number;
  start: number;
  end: number;
}

/**
 * チャンク PUT の結果
 */
export interface ChunkUploadResult extends ChunkRange {
  status: number;
  ok: boolean;
}

/**
 * uploadVideo の結果
 */
export interface UploadVideoResult {
  publishId: string;
  session: UploadSession;
  chunks: ChunkUploadResult[];
}
