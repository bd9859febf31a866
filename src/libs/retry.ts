import type { Logger } from "@logtape/logtape";
import { RetryExhaustedError, errorMessage } from "../utils/errors";

/**
 * 関数呼び出し全体を再実行するリトライポリシー
 */
export interface RetryPolicy {
  maxAttempts: number;
  /** false を返したエラーは即座に再スローする */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** 次の試行までの待ち時間（ミリ秒）。デフォルトは 0 */
  backoffMs?: (attempt: number) => number;
}

export const DEFAULT_MAX_RETRIES = 2;

export function fixedRetryPolicy(
  maxAttempts: number = DEFAULT_MAX_RETRIES
): RetryPolicy {
  return { maxAttempts };
}

/**
 * ポリシーに従って fn を実行する
 */
export async function withRetry<T>(
  name: string,
  policy: RetryPolicy,
  fn: (attempt: number) => Promise<T>,
  logger?: Logger
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      logger?.error("Attempt {attempt} of {name} failed: {message}", {
        attempt,
        name,
        message: errorMessage(error),
      });

      if (policy.shouldRetry && !policy.shouldRetry(error, attempt)) {
        throw error;
      }

      if (attempt < policy.maxAttempts) {
        const delay = policy.backoffMs?.(attempt) ?? 0;
        if (delay > 0) await sleep(delay);
      }
    }
  }

  throw new RetryExhaustedError(
    `Max retries reached for ${name}: ${errorMessage(lastError)}`,
    policy.maxAttempts,
    lastError
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
