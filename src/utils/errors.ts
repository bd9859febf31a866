/**
 * カスタムエラーの基底クラス
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code: string = "INTERNAL_ERROR"
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * バリデーションエラー
 */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, "VALIDATION_ERROR");
  }
}

/**
 * CSRF state 不一致
 */
export class CsrfError extends AppError {
  constructor(message: string = "State mismatch. Potential CSRF attack.") {
    super(message, 400, "CSRF_ERROR");
  }
}

/**
 * 認証エラー
 */
export class AuthenticationError extends AppError {
  constructor(message: string = "Authentication failed") {
    super(message, 401, "AUTHENTICATION_ERROR");
  }
}

/**
 * リソースが見つからない
 */
export class NotFoundError extends AppError {
  constructor(message: string = "Resource not found") {
    super(message, 404, "NOT_FOUND");
  }
}

/**
 * TikTok API エラー
 * コールバックでは呼び出し元にそのまま 400 で返す
 */
export class TikTokApiError extends AppError {
  constructor(message: string, statusCode: number = 400) {
    super(message, statusCode, "TIKTOK_API_ERROR");
  }
}

/**
 * トークンファイルの読み書きエラー
 */
export class StorageError extends AppError {
  constructor(message: string) {
    super(message, 500, "STORAGE_ERROR");
  }
}

/**
 * 環境変数の設定エラー
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 500, "CONFIG_ERROR");
  }
}

/**
 * リトライ回数の上限到達
 */
export class RetryExhaustedError extends AppError {
  constructor(
    message: string,
    public attempts: number,
    public lastError?: unknown
  ) {
    super(message, 500, "RETRY_EXHAUSTED");
  }
}

/**
 * unknown なエラーからメッセージを取り出す
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
