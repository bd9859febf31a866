import { z } from "zod";
import type { LogLevel } from "./logger";
import { ConfigError } from "./utils/errors";

const envSchema = z.object({
  TIKTOK_CLIENT_ID: z.string().min(1),
  TIKTOK_CLIENT_SECRET: z.string().min(1),
  TIKTOK_REDIRECT_URI: z.string().url(),
  TIKTOK_CODE_CHALLENGE_ENCODING: z.enum(["hex", "base64url"]).default("hex"),
  USER_TOKEN_FILENAME: z.string().min(1).default("user_tokens.json"),
  MAX_RETRIES: z.coerce.number().int().min(1).default(2),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(["debug", "info", "warning", "error"]).default("info"),
  LOG_FILE: z.string().min(1).default("upload.log"),
  REFRESH_BEFORE_UPLOAD: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),
});

/**
 * アプリケーション設定
 */
export interface AppConfig {
  clientKey: string;
  clientSecret: string;
  redirectUri: string;
  codeChallengeEncoding: "hex" | "base64url";
  tokenFile: string;
  maxRetries: number;
  port: number;
  logLevel: LogLevel;
  logFile: string;
  refreshBeforeUpload: boolean;
}

/**
 * 環境変数から設定を読み込む
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new ConfigError(`Invalid environment configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    clientKey: values.TIKTOK_CLIENT_ID,
    clientSecret: values.TIKTOK_CLIENT_SECRET,
    redirectUri: values.TIKTOK_REDIRECT_URI,
    codeChallengeEncoding: values.TIKTOK_CODE_CHALLENGE_ENCODING,
    tokenFile: values.USER_TOKEN_FILENAME,
    maxRetries: values.MAX_RETRIES,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    logFile: values.LOG_FILE,
    refreshBeforeUpload: values.REFRESH_BEFORE_UPLOAD,
  };
}
