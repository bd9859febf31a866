import { Hono } from "hono";
import type { HonoEnv } from "../../types/bindings";
import { TokenRefreshService } from "../../services/tokenRefreshService";

const app = new Hono<HonoEnv>();

/**
 * 手動トークンリフレッシュ（全ユーザー）
 */
app.get("/", async (c) => {
  const tokenRefreshService = new TokenRefreshService(c.env);
  const result = await tokenRefreshService.checkAndRefreshTokens();

  return c.json({
    success: true,
    message: "Token refresh process completed",
    result,
  });
});

export default app;
