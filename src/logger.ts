import { getRotatingFileSink } from "@logtape/file";
import {
  configure,
  getConsoleSink,
  getLogger,
  jsonLinesFormatter,
  type Logger,
} from "@logtape/logtape";

export type LogLevel = "debug" | "info" | "warning" | "error";

/** ルートカテゴリ */
export const LOG_CATEGORY = "tiktok-uploader";

export interface LoggingOptions {
  level: LogLevel;
  logFile: string;
  maxSize?: number;
  maxFiles?: number;
}

let configured = false;

/**
 * LogTape を初期化（コンソール + ローテーション付き JSONL ファイル）
 * 2 回目以降の呼び出しは何もしない
 */
export async function configureLogging(options: LoggingOptions): Promise<void> {
  if (configured) return;

  await configure({
    sinks: {
      console: getConsoleSink(),
      file: getRotatingFileSink(options.logFile, {
        formatter: jsonLinesFormatter,
        maxSize: options.maxSize ?? 1024 * 1024,
        maxFiles: options.maxFiles ?? 5,
      }),
    },
    loggers: [
      {
        category: [LOG_CATEGORY],
        sinks: ["console", "file"],
        lowestLevel: options.level,
      },
      {
        category: ["logtape", "meta"],
        sinks: ["console"],
        lowestLevel: "warning",
      },
    ],
  });

  configured = true;
}

/**
 * サブシステムのロガーを取得
 */
export function getAppLogger(subsystem: string): Logger {
  return getLogger([LOG_CATEGORY, subsystem]);
}
