/**
 * ジョブのエラー分類
 *
 * - 年単位で握って「欠損年」として記録するもの: HttpStatusError / TransportError (utils/http), ResponseShapeError
 * - ラン全体を失敗させるもの: 上記以外すべて
 */

/**
 * API レスポンスが想定した形になっていない
 */
export class ResponseShapeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResponseShapeError';
  }
}

/**
 * 取得対象の年範囲を決められなかった
 */
export class RangeDiscoveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RangeDiscoveryError';
  }
}

/**
 * 生データを表形式に変換できなかった
 */
export class TransformError extends Error {
  constructor(
    message: string,
    public readonly year?: string
  ) {
    super(message);
    this.name = 'TransformError';
  }
}

/**
 * オブジェクトストレージへのアップロード失敗
 */
export class StorageUploadError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StorageUploadError';
  }
}

/**
 * シークレット取得失敗（起動時の致命的エラー）
 */
export class SecretRetrievalError extends Error {
  constructor(
    message: string,
    public readonly secretName: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SecretRetrievalError';
  }
}

/**
 * 環境変数の設定不備
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * ジョブ全体の実行期限切れ
 */
export class JobDeadlineError extends Error {
  constructor(public readonly deadlineMs: number) {
    super(`Job exceeded deadline of ${deadlineMs}ms`);
    this.name = 'JobDeadlineError';
  }
}

/**
 * unknown からメッセージ文字列を取り出す
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 複数ステージの失敗をまとめたもの
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly failures: Array<{ stage: string; error: unknown }>
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}
