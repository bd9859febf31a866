import { loadConfig } from "./config";
import { createBindings } from "./env";
import { configureLogging } from "./logger";
import { runTokenRefreshJob, runUploadJob } from "./scheduled";
import { loadPendingUploads } from "./services/uploadJobService";

const DEFAULT_PENDING_UPLOADS_FILE = "videos_to_upload.json";

/**
 * 一括アップロードのエントリーポイント
 * Usage: npm run upload -- [pending-uploads.json]
 */
async function main(): Promise<void> {
  const config = loadConfig();
  await configureLogging({ level: config.logLevel, logFile: config.logFile });

  const env = createBindings(config);

  if (config.refreshBeforeUpload) {
    await runTokenRefreshJob(env);
  }

  const filePath = process.argv[2] ?? DEFAULT_PENDING_UPLOADS_FILE;
  const entries = await loadPendingUploads(filePath);
  const { job } = await runUploadJob(env, entries);

  process.exitCode = job.success ? 0 : 1;
}

main().catch((error: unknown) => {
  console.error("Upload job error:", error);
  process.exit(1);
});
