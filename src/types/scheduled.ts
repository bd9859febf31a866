/**
 * ジョブの実行結果
 */
export interface JobResult {
  jobName: string;
  startTime: string; // ISO 8601
  endTime: string; // ISO 8601
  duration: number; // ミリ秒
  success: boolean;
  message?: string;
  error?: string;
}

/**
 * リフレッシュ結果
 */
export interface RefreshResult {
  total: number; // 対象ユーザー数
  refreshed: number; // リフレッシュ成功数
  skipped: number; // アクセストークンが有効、または期限情報なし
  expired: number; // リフレッシュトークン期限切れ（再認可が必要）
  failed: number; // 失敗数
  errors: RefreshError[]; // エラー詳細
}

/**
 * リフレッシュエラー
 */
export interface RefreshError {
  openId: string;
  error: string;
  timestamp: string; // ISO 8601
}

/**
 * 一括アップロード結果
 */
export interface UploadJobResult {
  total: number;
  success: number;
  failed: number;
  errors: UploadJobError[];
}

/**
 * 一括アップロードエラー
 */
export interface UploadJobError {
  videoPath?: string;
  userId?: string;
  error: string;
  timestamp: string; // ISO 8601
}
