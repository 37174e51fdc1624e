/**
 * Scrape Error Type / Scrape Error
 *
 * 目的:
 * - 失敗原因の分類 (一覧取得は致命的、詳細取得は吸収)
 * - エラー種別ごとのログ出力
 */

/**
 * スクレイピングエラー種別
 */
export enum ScrapeErrorType {
  /** ネットワークエラー (接続失敗など) */
  NETWORK_ERROR = "NETWORK_ERROR",

  /** タイムアウト */
  TIMEOUT = "TIMEOUT",

  /** 2xx 以外の HTTP ステータス */
  HTTP_STATUS = "HTTP_STATUS",

  /** サイト設定 (YAML) の不備 */
  CONFIG_INVALID = "CONFIG_INVALID",

  /** 出力ファイルの書き込み失敗 */
  OUTPUT_WRITE_FAILED = "OUTPUT_WRITE_FAILED",

  /** ブラウザ起動・操作エラー (スナップショット) */
  BROWSER_ERROR = "BROWSER_ERROR",

  UNKNOWN_ERROR = "UNKNOWN_ERROR",
}

/**
 * Scrape Error クラス
 */
export class ScrapeError extends Error {
  public readonly type: ScrapeErrorType;
  public readonly url?: string;
  public readonly status?: number;
  public readonly errorCause?: unknown;

  constructor(
    type: ScrapeErrorType,
    message: string,
    options?: {
      url?: string;
      status?: number;
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = "ScrapeError";
    this.type = type;
    this.url = options?.url;
    this.status = options?.status;
    this.errorCause = options?.cause;
  }

  /**
   * ログ用オブジェクト変換
   */
  toLogObject(): Record<string, unknown> {
    return {
      errorType: this.type,
      message: this.message,
      url: this.url,
      status: this.status,
      cause:
        this.errorCause instanceof Error
          ? this.errorCause.message
          : this.errorCause,
    };
  }

  /**
   * 任意の例外を ScrapeError に正規化
   */
  static from(error: unknown, fallbackType: ScrapeErrorType, url?: string): ScrapeError {
    if (error instanceof ScrapeError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ScrapeError(fallbackType, message, { url, cause: error });
  }
}
