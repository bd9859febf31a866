import type { Bindings } from "./types/bindings";
import type { JobResult } from "./types/scheduled";
import { getAppLogger } from "./logger";
import { TokenRefreshService } from "./services/tokenRefreshService";
import { UploadJobService } from "./services/uploadJobService";
import { errorMessage } from "./utils/errors";

const logger = getAppLogger("job");

/**
 * ジョブを実行し、所要時間と結果をまとめる
 */
async function runJob<T>(
  jobName: string,
  task: () => Promise<T>,
  summarize: (result: T) => { success: boolean; message: string }
): Promise<{ job: JobResult; result: T }> {
  const startTime = new Date().toISOString();
  logger.info("[Job] {jobName} started at {startTime}", { jobName, startTime });

  try {
    const result = await task();
    const { success, message } = summarize(result);

    const job: JobResult = {
      jobName,
      startTime,
      endTime: new Date().toISOString(),
      duration: Date.now() - new Date(startTime).getTime(),
      success,
      message,
    };

    logger.info("[Job] {jobName} completed: {message}", { ...job });
    return { job, result };
  } catch (error) {
    const job: JobResult = {
      jobName,
      startTime,
      endTime: new Date().toISOString(),
      duration: Date.now() - new Date(startTime).getTime(),
      success: false,
      error: errorMessage(error),
    };

    logger.error("[Job] {jobName} failed: {error}", { ...job });
    throw error;
  }
}

/**
 * 期限切れトークンのリフレッシュジョブ
 */
export async function runTokenRefreshJob(env: Bindings) {
  return await runJob(
    "token-refresh",
    () => new TokenRefreshService(env).checkAndRefreshTokens(),
    (result) => ({
      success: result.failed === 0,
      message: `Total: ${result.total}, Refreshed: ${result.refreshed}, Skipped: ${result.skipped}, Expired: ${result.expired}, Failed: ${result.failed}`,
    })
  );
}

/**
 * 一括アップロードジョブ
 */
export async function runUploadJob(env: Bindings, entries: unknown[]) {
  return await runJob(
    "upload-all",
    () => new UploadJobService(env).uploadAll(entries),
    (result) => ({
      success: result.failed === 0,
      message: `Total: ${result.total}, Success: ${result.success}, Failed: ${result.failed}`,
    })
  );
}
