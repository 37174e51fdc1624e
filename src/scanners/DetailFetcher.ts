/**
 * DetailFetcher
 *
 * 目的: 詳細ページを取得してメールアドレスを探す
 *
 * 失敗時の扱い:
 * - URL なし・ネットワークエラー・タイムアウト・2xx 以外 → 空の結果
 * - 呼び出し側は空の結果を「メールなし」として扱い、処理は継続する
 * - 1 レコードにつきリクエストは 1 回のみ (リトライなし)
 */

import type { IHttpClient } from "@/core/interfaces/IHttpClient";
import type { EmailLookup } from "@/core/domain/ListingRecord";
import { ScrapeError, ScrapeErrorType } from "@/core/domain/ScrapeError";
import { extractEmailFromHtml } from "@/extractors/common/EmailExtractor";
import { logger as defaultLogger, Logger } from "@/config/logger";

export type DetailPage =
  | { readonly kind: "document"; readonly url: string; readonly html: string }
  | { readonly kind: "empty"; readonly reason: "no_url" | "fetch_failed" };

export class DetailFetcher {
  constructor(
    private readonly http: IHttpClient,
    private readonly logger: Logger = defaultLogger,
  ) {}

  /**
   * 詳細ページ取得 (例外は投げない)
   */
  async fetch(url: string | null): Promise<DetailPage> {
    if (!url) {
      return { kind: "empty", reason: "no_url" };
    }

    try {
      const response = await this.http.get(url);
      return { kind: "document", url, html: response.body };
    } catch (error) {
      const scrapeError = ScrapeError.from(error, ScrapeErrorType.UNKNOWN_ERROR, url);
      this.logger.warn(scrapeError.toLogObject(), "詳細ページ取得失敗 - メールなしとして続行");
      return { kind: "empty", reason: "fetch_failed" };
    }
  }

  /**
   * 詳細ページからメールアドレスを検索
   */
  async lookupEmail(url: string | null): Promise<EmailLookup> {
    const page = await this.fetch(url);

    if (page.kind === "empty") {
      return {
        status: "not_found",
        reason: page.reason === "no_url" ? "no_detail_url" : "fetch_failed",
      };
    }

    const address = extractEmailFromHtml(page.html);
    if (!address) {
      return { status: "not_found", reason: "not_on_page" };
    }

    this.logger.debug({ url, email: address }, "メールアドレス検出");
    return { status: "found", address };
  }
}
