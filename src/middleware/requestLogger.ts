import { randomUUID } from "node:crypto";
import type { Context, Next } from "hono";
import type { HonoEnv } from "../types/bindings";
import { getAppLogger } from "../logger";

const logger = getAppLogger("http");

/**
 * リクエストロギングミドルウェア
 */
export async function requestLogger(
  c: Context<HonoEnv>,
  next: Next
): Promise<void> {
  const requestId = randomUUID();
  const startTime = Date.now();

  c.set("requestId", requestId);
  c.set("startTime", startTime);

  logger.info("[Request] {method} {path}", {
    requestId,
    method: c.req.method,
    path: c.req.path,
  });

  await next();

  const duration = Date.now() - startTime;

  logger.info("[Response] {method} {path} {status} ({duration}ms)", {
    requestId,
    method: c.req.method,
    path: c.req.path,
    status: c.res.status,
    duration,
  });
}
