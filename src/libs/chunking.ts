import type { ChunkRange } from "../types/upload";
import { ValidationError } from "../utils/errors";

/**
 * Media Transfer Guide の上限
 * @see https://developers.tiktok.com/doc/content-posting-api-media-transfer-guide
 */
export const MAX_CHUNK_SIZE = 64_000_000;

export interface UploadPlan {
  chunkSize: number;
  totalChunkCount: number;
}

/**
 * チャンクサイズとチャンク数を決める
 * 端数は最後のチャンクに含めるため、チャンク数は切り捨て（最低 1）
 */
export function planUpload(
  videoSize: number,
  maxChunkSize: number = MAX_CHUNK_SIZE
): UploadPlan {
  if (!Number.isInteger(videoSize) || videoSize <= 0) {
    throw new ValidationError(`Invalid video size: ${videoSize}`);
  }

  const chunkSize = Math.min(maxChunkSize, videoSize);
  const totalChunkCount = Math.max(1, Math.floor(videoSize / chunkSize));
  return { chunkSize, totalChunkCount };
}

/**
 * 各チャンクのバイト範囲を計算
 * 最後のチャンクの end は常に videoSize - 1
 */
export function planChunks(videoSize: number, chunkSize: number): ChunkRange[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError(`Invalid chunk size: ${chunkSize}`);
  }

  const { totalChunkCount } = planUpload(videoSize, chunkSize);
  const ranges: ChunkRange[] = [];

  for (let index = 0; index < totalChunkCount; index++) {
    const start = index * chunkSize;
    const isLast = index === totalChunkCount - 1;
    const end = isLast
      ? videoSize - 1
      : Math.min(start + chunkSize, videoSize) - 1;
    ranges.push({ index, start, end });
  }

  return ranges;
}

/**
 * Content-Range ヘッダーの値
 */
export function contentRange(range: ChunkRange, videoSize: number): string {
  return `bytes ${range.start}-${range.end}/${videoSize}`;
}
