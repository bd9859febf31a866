import { open, stat } from "node:fs/promises";
import { z } from "zod";
import type { Bindings } from "../types/bindings";
import type {
  CreatorInfo,
  FileUploadSourceInfo,
  PostInfo,
  VideoInitData,
} from "../types/tiktok";
import type {
  ChunkUploadResult,
  PostOptions,
  UploadSession,
  UploadVideoResult,
} from "../types/upload";
import { contentRange, planChunks, planUpload } from "../libs/chunking";
import { fixedRetryPolicy, withRetry, type RetryPolicy } from "../libs/retry";
import { getAppLogger } from "../logger";
import { StorageError } from "../utils/errors";
import { creatorInfoSchema, videoInitDataSchema } from "../utils/validation";

const logger = getAppLogger("upload");

const creatorInfoResponseSchema = z.object({ data: creatorInfoSchema });
const videoInitResponseSchema = z.object({ data: videoInitDataSchema });

/**
 * creator_info の設定で投稿オプションを上書き
 * プライバシーは許可された選択肢の最後のものを使う
 */
export function applyCreatorSettings(
  info: CreatorInfo,
  options: PostOptions = {}
): PostOptions {
  const privacyOptions = info.privacy_level_options ?? [];
  const merged: PostOptions = {
    ...options,
    privacy_level:
      privacyOptions.length > 0
        ? privacyOptions[privacyOptions.length - 1]
        : options.privacy_level ?? "SELF_ONLY",
  };

  if (info.comment_disabled != null) merged.disable_comment = info.comment_disabled;
  if (info.duet_disabled != null) merged.disable_duet = info.duet_disabled;
  if (info.stitch_disabled != null) merged.disable_stitch = info.stitch_disabled;

  return merged;
}

/**
 * post_info を組み立てる（未指定はデフォルト値）
 */
export function buildPostInfo(title: string, options: PostOptions = {}): PostInfo {
  const postInfo: PostInfo = {
    title,
    privacy_level: options.privacy_level ?? "SELF_ONLY",
    disable_duet: options.disable_duet ?? false,
    disable_comment: options.disable_comment ?? false,
    disable_stitch: options.disable_stitch ?? false,
    brand_content_toggle: options.brand_content_toggle ?? false,
    brand_organic_toggle: options.brand_organic_toggle ?? false,
    is_aigc: options.is_aigc ?? false,
  };

  if (options.video_cover_timestamp_ms !== undefined) {
    postInfo.video_cover_timestamp_ms = options.video_cover_timestamp_ms;
  }

  return postInfo;
}

/**
 * TikTok Content Posting API（Direct Post）サービス
 * @see https://developers.tiktok.com/doc/content-posting-api-reference-direct-post/
 * @see https://developers.tiktok.com/doc/content-posting-api-media-transfer-guide
 */
export class UploadService {
  static readonly CREATOR_INFO_URL =
    "https://open.tiktokapis.com/v2/post/publish/creator_info/query/";
  static readonly VIDEO_INIT_URL =
    "https://open.tiktokapis.com/v2/post/publish/video/init/";

  private readonly fetch: typeof fetch;
  private readonly retryPolicy: RetryPolicy;

  constructor(env: Bindings, retryPolicy?: RetryPolicy) {
    this.fetch = env.fetch ?? fetch.bind(globalThis);
    this.retryPolicy = retryPolicy ?? fixedRetryPolicy(env.MAX_RETRIES);
  }

  /**
   * クリエイターのプロフィール設定を取得
   * 投稿メタデータはアカウント設定と一致している必要がある
   */
  async queryCreatorInfo(accessToken: string): Promise<CreatorInfo | null> {
    const response = await this.fetch(UploadService.CREATOR_INFO_URL, {
      method: "POST",
      headers: jsonHeaders(accessToken),
    });

    if (!response.ok) {
      logger.error("Error querying creator info: {status} - {body}", {
        status: response.status,
        body: await response.text(),
      });
      return null;
    }

    return creatorInfoResponseSchema.parse(await response.json()).data;
  }

  /**
   * アップロードを初期化し、アップロード URL を取得
   */
  async initializeVideoUpload(
    accessToken: string,
    videoSize: number,
    title: string,
    options: PostOptions = {}
  ): Promise<{ initData: VideoInitData; session: UploadSession } | null> {
    const { chunkSize, totalChunkCount } = planUpload(videoSize);

    const sourceInfo: FileUploadSourceInfo = {
      source: "FILE_UPLOAD",
      video_size: videoSize,
      chunk_size: chunkSize,
      total_chunk_count: totalChunkCount,
    };

    const response = await this.fetch(UploadService.VIDEO_INIT_URL, {
      method: "POST",
      headers: jsonHeaders(accessToken),
      body: JSON.stringify({
        post_info: buildPostInfo(title, options),
        source_info: sourceInfo,
      }),
    });

    if (!response.ok) {
      logger.error("Error initializing video upload: {status} - {body}", {
        status: response.status,
        body: await response.text(),
      });
      return null;
    }

    const initData = videoInitResponseSchema.parse(await response.json()).data;
    return {
      initData,
      session: {
        uploadUrl: initData.upload_url,
        chunkSize,
        totalChunkCount,
        videoSize,
      },
    };
  }

  /**
   * 動画ファイルをチャンクに分割して PUT する
   * 失敗したチャンクはログに残すだけで再送しない
   */
  async uploadVideoChunks(
    uploadUrl: string,
    videoPath: string,
    chunkSize: number
  ): Promise<ChunkUploadResult[] | null> {
    const videoSize = await regularFileSize(videoPath);
    if (videoSize === null) {
      logger.error("Invalid file: {videoPath}", { videoPath });
      return null;
    }

    const results: ChunkUploadResult[] = [];
    const file = await open(videoPath, "r");

    try {
      for (const range of planChunks(videoSize, chunkSize)) {
        const length = range.end - range.start + 1;
        const chunk = Buffer.alloc(length);
        const { bytesRead } = await file.read(chunk, 0, length, range.start);
        if (bytesRead !== length) {
          throw new StorageError(
            `Short read on ${videoPath}: expected ${length} bytes at ${range.start}, got ${bytesRead}`
          );
        }

        logger.debug("Uploading chunk {index}: bytes {start}-{end}", {
          index: range.index,
          start: range.start,
          end: range.end,
        });

        const response = await this.fetch(uploadUrl, {
          method: "PUT",
          headers: {
            "Content-Type": "video/mp4",
            "Content-Length": String(length),
            "Content-Range": contentRange(range, videoSize),
          },
          body: chunk,
        });

        if (!response.ok) {
          logger.error("Chunk {index} upload failed: {status} - {body}", {
            index: range.index,
            status: response.status,
            body: await response.text(),
          });
        }

        results.push({ ...range, status: response.status, ok: response.ok });
      }
    } finally {
      await file.close();
    }

    return results;
  }

  /**
   * クリエイター情報の取得 → 初期化 → チャンクアップロード
   * 例外が出た場合は最初からやり直す
   */
  async uploadVideo(
    videoPath: string,
    description: string,
    userId: string,
    accessToken: string,
    options: PostOptions = {}
  ): Promise<UploadVideoResult | null> {
    return await withRetry(
      "uploadVideo",
      this.retryPolicy,
      async () => {
        const videoSize = await regularFileSize(videoPath);
        if (videoSize === null) {
          logger.error("Invalid file: {videoPath}", { videoPath });
          return null;
        }

        const creatorInfo = await this.queryCreatorInfo(accessToken);
        if (!creatorInfo) {
          logger.error("Could not retrieve info for user {userId}", { userId });
          return null;
        }

        const initialized = await this.initializeVideoUpload(
          accessToken,
          videoSize,
          description,
          applyCreatorSettings(creatorInfo, options)
        );
        if (!initialized) {
          return null;
        }

        const { initData, session } = initialized;
        const chunks = await this.uploadVideoChunks(
          session.uploadUrl,
          videoPath,
          session.chunkSize
        );

        if (!chunks) {
          return null;
        }

        return { publishId: initData.publish_id, session, chunks };
      },
      logger
    );
  }
}

function jsonHeaders(accessToken: string): Record<string, string> {
  return {
    Authorization: `Bearer ${accessToken}`,
    "Content-Type": "application/json; charset=UTF-8",
  };
}

async function regularFileSize(path: string): Promise<number | null> {
  try {
    const stats = await stat(path);
    return stats.isFile() ? stats.size : null;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}
