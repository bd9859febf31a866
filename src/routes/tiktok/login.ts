import { Hono } from "hono";
import type { HonoEnv } from "../../types/bindings";
import { TikTokAuthService } from "../../services/tiktokAuthService";

const app = new Hono<HonoEnv>();

/**
 * OAuth 認証開始
 */
app.get("/", async (c) => {
  const authService = new TikTokAuthService(c.env);
  const authUrl = await authService.generateAuthUrl();

  return c.redirect(authUrl);
});

export default app;
