/**
 * HTTP クライアント
 * fetch ベース (Node 標準の keep-alive 接続を直列に再利用)
 *
 * - 固定 User-Agent / 追加ヘッダを毎回送信
 * - 固定タイムアウト後に中断
 * - リトライなし
 */

import type {
  HttpResponse,
  IHttpClient,
  QueryParams,
} from "@/core/interfaces/IHttpClient";
import type { HttpSettings } from "@/core/domain/SiteConfig";
import { ScrapeError, ScrapeErrorType } from "@/core/domain/ScrapeError";
import { logger as defaultLogger, Logger } from "@/config/logger";

export class HttpClient implements IHttpClient {
  private readonly headers: Record<string, string>;

  constructor(
    private readonly settings: HttpSettings,
    private readonly logger: Logger = defaultLogger,
  ) {
    this.headers = {
      ...settings.headers,
      "User-Agent": settings.userAgent,
    };
  }

  async get(url: string, query?: QueryParams): Promise<HttpResponse> {
    const target = buildUrl(url, query);
    const startTime = Date.now();

    let response: Response;
    try {
      response = await fetch(target, {
        method: "GET",
        headers: this.headers,
        signal: AbortSignal.timeout(this.settings.timeout),
      });
    } catch (error) {
      throw this.toFetchError(error, target);
    }

    if (!response.ok) {
      // ボディは読まずに接続を解放
      await response.body?.cancel();
      throw new ScrapeError(
        ScrapeErrorType.HTTP_STATUS,
        `HTTP ${response.status}: ${response.statusText}`,
        { url: target, status: response.status },
      );
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw this.toFetchError(error, target);
    }

    this.logger.debug(
      { url: target, status: response.status, duration_ms: Date.now() - startTime },
      "HTTP GET 完了",
    );

    return { url: response.url || target, status: response.status, body };
  }

  private toFetchError(error: unknown, url: string): ScrapeError {
    if (
      error instanceof Error &&
      (error.name === "TimeoutError" || error.name === "AbortError")
    ) {
      return new ScrapeError(
        ScrapeErrorType.TIMEOUT,
        `Request timeout (${this.settings.timeout}ms)`,
        { url, cause: error },
      );
    }
    return ScrapeError.from(error, ScrapeErrorType.NETWORK_ERROR, url);
  }
}

/**
 * クエリパラメータを付与した URL を生成
 * 既存のクエリは保持する
 */
export function buildUrl(url: string, query?: QueryParams): string {
  if (!query || Object.keys(query).length === 0) {
    return url;
  }
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    target.searchParams.set(key, String(value));
  }
  return target.toString();
}
