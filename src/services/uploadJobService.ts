import { readFile } from "node:fs/promises";
import type { Bindings } from "../types/bindings";
import type { PendingUpload } from "../types/upload";
import type { UploadJobResult } from "../types/scheduled";
import type { RetryPolicy } from "../libs/retry";
import { getAppLogger } from "../logger";
import { ValidationError, errorMessage } from "../utils/errors";
import { parsePendingUpload } from "../utils/validation";
import { TokenService } from "./tokenService";
import { UploadService } from "./uploadService";

const logger = getAppLogger("upload-job");

/**
 * 説明文の後ろにタグを付ける
 */
export function buildDescription(entry: PendingUpload): string {
  return [entry.description, ...entry.tags].join(" ").trim();
}

/**
 * アップロード待ちリスト（JSON 配列）を読み込む
 */
export async function loadPendingUploads(filePath: string): Promise<unknown[]> {
  const json: unknown = JSON.parse(await readFile(filePath, "utf8"));
  if (!Array.isArray(json)) {
    throw new ValidationError(`Pending uploads file must be a JSON array: ${filePath}`);
  }
  return json;
}

/**
 * 一括アップロードサービス
 */
export class UploadJobService {
  private tokenService: TokenService;
  private uploadService: UploadService;

  constructor(env: Bindings, retryPolicy?: RetryPolicy) {
    this.tokenService = new TokenService(env);
    this.uploadService = new UploadService(env, retryPolicy);
  }

  /**
   * 全エントリをアップロード
   * 1 件の失敗はログに記録して次へ進む
   */
  async uploadAll(entries: unknown[]): Promise<UploadJobResult> {
    const result: UploadJobResult = {
      total: entries.length,
      success: 0,
      failed: 0,
      errors: [],
    };

    for (const raw of entries) {
      let entry: PendingUpload | undefined;
      try {
        entry = parsePendingUpload(raw);
        const accessToken = await this.tokenService.getAccessToken(entry.user_id);

        const uploaded = await this.uploadService.uploadVideo(
          entry.video_path,
          buildDescription(entry),
          entry.user_id,
          accessToken
        );
        if (!uploaded) {
          throw new Error(`Upload did not complete for ${entry.video_path}`);
        }

        const failedChunks = uploaded.chunks.filter((chunk) => !chunk.ok);
        if (failedChunks.length > 0) {
          throw new Error(
            `${failedChunks.length} of ${uploaded.chunks.length} chunks failed for ${entry.video_path}`
          );
        }

        result.success++;
        logger.info("Uploaded {videoPath} for user {userId} ({publishId})", {
          videoPath: entry.video_path,
          userId: entry.user_id,
          publishId: uploaded.publishId,
        });
      } catch (error) {
        result.failed++;
        result.errors.push({
          videoPath: entry?.video_path,
          userId: entry?.user_id,
          error: errorMessage(error),
          timestamp: new Date().toISOString(),
        });
        logger.error("uploadAll failed on entry: {entry} ErrorMsg: {error}", {
          entry: raw,
          error: errorMessage(error),
        });
      }
    }

    return result;
  }
}
