/**
 * PaginationDriver
 *
 * 状態 = 現在のページ番号 (1 から)
 *
 * 1. ページ N を取得してパース
 * 2. 0 件なら終了 (以降のページも空とみなす。再確認なし)
 * 3. 各レコードの詳細ページからメールを検索し、県名を付与して蓄積
 * 4. 固定時間待機して N+1 へ
 *
 * 一覧ページの取得失敗は致命的 (例外をそのまま伝播)。
 * 詳細ページの取得失敗は「メールなし」として吸収される。
 */

import type { IHttpClient } from "@/core/interfaces/IHttpClient";
import type { ListingRecord } from "@/core/domain/ListingRecord";
import { toListingRecord } from "@/core/domain/ListingRecord";
import type { SearchSettings } from "@/core/domain/SiteConfig";
import { ScrapeError, ScrapeErrorType } from "@/core/domain/ScrapeError";
import type { ListingParser } from "@/extractors/ListingParser";
import type { DetailFetcher } from "@/scanners/DetailFetcher";
import type { RateLimiter } from "@/utils/RateLimiter";
import { createPageLogger } from "@/utils/LoggerContext";
import { logger as defaultLogger, Logger } from "@/config/logger";

/**
 * 終了状態
 * - no_results: 1 ページ目が空
 * - done: 空ページに到達
 * - page_limit: maxPages に到達
 */
export type PaginationStatus = "no_results" | "done" | "page_limit";

export interface PageEvent {
  page: number;
  recordCount: number;
  html: string;
}

export interface PaginationResult {
  status: PaginationStatus;
  records: ListingRecord[];
  /** 一覧ページの取得回数 (空ページの確認分を含む) */
  pagesFetched: number;
  /** 空でないページごとの件数 */
  pageCounts: number[];
}

export interface PaginationDriverDeps {
  http: IHttpClient;
  parser: ListingParser;
  detailFetcher: DetailFetcher;
  rateLimiter: RateLimiter;
  search: SearchSettings;
  maxPages?: number;
  logger?: Logger;
  /** ページ取得・パースごとのコールバック (debug 用) */
  onPage?: (event: PageEvent) => void | Promise<void>;
}

export class PaginationDriver {
  private readonly logger: Logger;

  constructor(private readonly deps: PaginationDriverDeps) {
    this.logger = deps.logger ?? defaultLogger;
  }

  async run(prefecture: string): Promise<PaginationResult> {
    const { parser, detailFetcher, rateLimiter, maxPages, onPage } = this.deps;
    const records: ListingRecord[] = [];
    const pageCounts: number[] = [];
    let page = 1;
    let pagesFetched = 0;

    for (;;) {
      const pageLogger = createPageLogger(this.logger, page);

      const html = await this.fetchListingPage(prefecture, page);
      pagesFetched++;

      const listings = parser.parse(html);
      pageLogger.info({ record_count: listings.length }, "一覧ページ取得");

      if (onPage) {
        await onPage({ page, recordCount: listings.length, html });
      }

      if (listings.length === 0) {
        const status: PaginationStatus = page === 1 ? "no_results" : "done";
        return { status, records, pagesFetched, pageCounts };
      }

      for (const listing of listings) {
        const email = await detailFetcher.lookupEmail(listing.detailUrl);
        records.push(toListingRecord(listing, prefecture, email));
      }
      pageCounts.push(listings.length);

      if (maxPages !== undefined && page >= maxPages) {
        pageLogger.warn({ max_pages: maxPages }, "ページ上限に到達 - 終了");
        return { status: "page_limit", records, pagesFetched, pageCounts };
      }

      await rateLimiter.throttle(`page ${page}`);
      page++;
    }
  }

  private async fetchListingPage(prefecture: string, page: number): Promise<string> {
    const { http, search } = this.deps;
    const query = {
      ...search.extraParams,
      [search.prefectureParam]: prefecture,
      [search.pageParam]: page,
    };

    try {
      const response = await http.get(search.baseUrl, query);
      return response.body;
    } catch (error) {
      const scrapeError = ScrapeError.from(error, ScrapeErrorType.UNKNOWN_ERROR, search.baseUrl);
      this.logger.error(
        { ...scrapeError.toLogObject(), page },
        "一覧ページ取得失敗 - 中断",
      );
      throw scrapeError;
    }
  }
}
