import type { Bindings } from "../types/bindings";
import type { TikTokTokenResponse } from "../types/tiktok";
import {
  generateCodeChallenge,
  generateCodeVerifier,
  generateState,
} from "../libs/pkce";
import { getAppLogger } from "../logger";
import {
  AppError,
  AuthenticationError,
  CsrfError,
  TikTokApiError,
  errorMessage,
} from "../utils/errors";
import { oauthErrorSchema, tokenResponseSchema } from "../utils/validation";

const logger = getAppLogger("oauth");

/**
 * TikTok 認証サービス
 * @see https://developers.tiktok.com/doc/login-kit-desktop/
 * @see https://developers.tiktok.com/doc/oauth-user-access-token-management/
 */
export class TikTokAuthService {
  static readonly AUTHORIZE_URL = "https://www.tiktok.com/v2/auth/authorize/";
  static readonly TOKEN_URL = "https://open.tiktokapis.com/v2/oauth/token/";
  static readonly SCOPES = ["user.info.basic", "video.publish", "video.upload"];

  private readonly fetch: typeof fetch;

  constructor(private env: Bindings) {
    this.fetch = env.fetch ?? fetch.bind(globalThis);
  }

  /**
   * OAuth 認可 URL を生成
   * code_verifier は state をキーにして保存する
   */
  async generateAuthUrl(): Promise<string> {
    const codeVerifier = generateCodeVerifier();
    const codeChallenge = generateCodeChallenge(
      codeVerifier,
      this.env.CODE_CHALLENGE_ENCODING ?? "hex"
    );
    const state = generateState();

    await this.env.AUTH_ATTEMPTS.put(state, codeVerifier);

    const params = new URLSearchParams({
      client_key: this.env.TIKTOK_CLIENT_KEY,
      response_type: "code",
      scope: TikTokAuthService.SCOPES.join(","),
      redirect_uri: this.env.TIKTOK_REDIRECT_URI,
      state,
      code_challenge: codeChallenge,
      code_challenge_method: "S256",
    });

    return `${TikTokAuthService.AUTHORIZE_URL}?${params.toString()}`;
  }

  /**
   * State を検証し、保存済みの code_verifier を返す
   * State は一度しか使えない
   */
  async verifyState(state: string | undefined): Promise<string> {
    if (!state) {
      throw new CsrfError();
    }

    const attempt = await this.env.AUTH_ATTEMPTS.take(state);
    if (!attempt) {
      throw new CsrfError();
    }

    return attempt.codeVerifier;
  }

  /**
   * 認可コードをアクセストークンに交換
   */
  async exchangeCodeForToken(
    code: string,
    codeVerifier: string
  ): Promise<TikTokTokenResponse> {
    try {
      const response = await this.postToken({
        client_key: this.env.TIKTOK_CLIENT_KEY,
        client_secret: this.env.TIKTOK_CLIENT_SECRET,
        code,
        grant_type: "authorization_code",
        redirect_uri: this.env.TIKTOK_REDIRECT_URI,
        code_verifier: codeVerifier,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new TikTokApiError(`Failed to obtain access token: ${error}`);
      }

      return this.parseTokenResponse(await response.json());
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new TikTokApiError(
        `Failed to obtain access token: ${errorMessage(error)}`
      );
    }
  }

  /**
   * トークンをリフレッシュ（ユーザーの再認可は不要）
   */
  async refreshAccessToken(refreshToken: string): Promise<TikTokTokenResponse> {
    try {
      const response = await this.postToken({
        client_key: this.env.TIKTOK_CLIENT_KEY,
        client_secret: this.env.TIKTOK_CLIENT_SECRET,
        grant_type: "refresh_token",
        refresh_token: refreshToken,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new AuthenticationError(`Failed to refresh token: ${error}`);
      }

      return this.parseTokenResponse(await response.json());
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw error;
      }
      throw new AuthenticationError(
        `Failed to refresh token: ${errorMessage(error)}`
      );
    }
  }

  private postToken(body: Record<string, string>): Promise<Response> {
    return this.fetch(TikTokAuthService.TOKEN_URL, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        "Cache-Control": "no-cache",
      },
      body: new URLSearchParams(body).toString(),
    });
  }

  /**
   * HTTP 200 でも error フィールドが返ることがある
   */
  private parseTokenResponse(body: unknown): TikTokTokenResponse {
    const oauthError = oauthErrorSchema.safeParse(body);
    if (oauthError.success) {
      const { error, error_description, log_id } = oauthError.data;
      logger.warn("Token endpoint returned {error} (log_id: {logId})", {
        error,
        logId: log_id,
      });
      throw new TikTokApiError(
        `${error}: ${error_description ?? "no description"}`
      );
    }

    const token = tokenResponseSchema.safeParse(body);
    if (!token.success) {
      throw new TikTokApiError(
        `Unexpected token response: ${token.error.issues
          .map((issue) => `${issue.path.join(".")} ${issue.message}`)
          .join(", ")}`,
        502
      );
    }
    return token.data;
  }
}
