import { Hono } from "hono";
import type { HonoEnv } from "./types/bindings";
import { requestLogger } from "./middleware/requestLogger";
import { errorHandler } from "./middleware/errorHandler";
import loginRoute from "./routes/tiktok/login";
import callbackRoute from "./routes/tiktok/callback";
import refreshTokenRoute from "./routes/tiktok/refreshToken";

// 末尾スラッシュの有無を区別しない（/callback と /callback/ は同じ）
const app = new Hono<HonoEnv>({ strict: false });

// ミドルウェア
app.use("*", requestLogger);
app.onError(errorHandler);

app.get("/", (c) => {
  return c.html('<a href="/login">Login with TikTok</a>');
});

// ヘルスチェック
app.get("/health", (c) => {
  return c.json({
    status: "ok",
    service: "tiktok-upload-server",
    timestamp: new Date().toISOString(),
  });
});

// ルート
app.route("/login", loginRoute);
app.route("/callback", callbackRoute);
app.route("/refresh_token", refreshTokenRoute);

export default app;
