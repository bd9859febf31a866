import type { Context } from "hono";
import type { HonoEnv } from "../types/bindings";
import { getAppLogger } from "../logger";
import { AppError } from "../utils/errors";

const logger = getAppLogger("http");

/**
 * エラーハンドリングミドルウェア
 */
export async function errorHandler(
  err: Error,
  c: Context<HonoEnv>
): Promise<Response> {
  logger.error("[Error] {method} {path}: {message}", {
    requestId: c.get("requestId"),
    path: c.req.path,
    method: c.req.method,
    message: err.message,
    error: err,
  });

  const errorResponse = {
    error: {
      code: err instanceof AppError ? err.code : "INTERNAL_ERROR",
      message:
        err instanceof AppError ? err.message : "An unexpected error occurred",
    },
  };

  const statusCode = err instanceof AppError ? err.statusCode : 500;

  return new Response(JSON.stringify(errorResponse), {
    status: statusCode,
    headers: {
      "Content-Type": "application/json",
    },
  });
}
