import { Hono } from "hono";
import type { HonoEnv } from "../../types/bindings";
import { TikTokAuthService } from "../../services/tiktokAuthService";
import { TokenService } from "../../services/tokenService";
import { TikTokApiError, ValidationError } from "../../utils/errors";

const app = new Hono<HonoEnv>();

/**
 * OAuth コールバック処理
 */
app.get("/", async (c) => {
  const code = c.req.query("code");
  const state = c.req.query("state");

  const authService = new TikTokAuthService(c.env);
  const tokenService = new TokenService(c.env);

  // 1. State 検証（一度しか使えない）
  const codeVerifier = await authService.verifyState(state);

  // 2. ユーザーが認可を拒否した場合
  const error = c.req.query("error");
  if (error) {
    const description = c.req.query("error_description") ?? "no description";
    throw new TikTokApiError(`Authorization denied: ${error}: ${description}`);
  }

  if (!code) {
    throw new ValidationError("Missing code parameter");
  }

  // 3. アクセストークン・リフレッシュトークン取得
  const tokenData = await authService.exchangeCodeForToken(code, codeVerifier);

  // 4. open_id をキーにして保存
  await tokenService.saveTokenData(tokenData, tokenData.open_id);

  return c.text("Retrieved Scoped Access Token Successfully.");
});

export default app;
