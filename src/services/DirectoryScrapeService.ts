/**
 * DirectoryScrapeService
 *
 * 県単位の実行: PaginationDriver → RecordAggregator → SpreadsheetExporter
 *
 * - 結果 0 件ならファイルを書かずに no_results を返す
 * - debug 時は 1 ページ目の HTML を保存し、ページごとの件数を標準出力へ
 */

import * as fs from "fs/promises";
import * as path from "path";
import type { IHttpClient } from "@/core/interfaces/IHttpClient";
import type { RuntimeConfig } from "@/config/RuntimeConfig";
import { OUTPUT_CONFIG } from "@/config/constants";
import { HttpClient } from "@/scanners/HttpClient";
import { DetailFetcher } from "@/scanners/DetailFetcher";
import { ListingParser } from "@/extractors/ListingParser";
import { RateLimiter, type SleepFn } from "@/utils/RateLimiter";
import { createRunLogger, logImportant } from "@/utils/LoggerContext";
import { PaginationDriver, type PageEvent } from "@/services/PaginationDriver";
import { aggregateRecords } from "@/services/RecordAggregator";
import { SpreadsheetExporter, type SheetTable } from "@/services/SpreadsheetExporter";
import type { Logger } from "@/config/logger";

export interface ScrapeRequest {
  prefecture: string;
  outPath: string;
}

export type ScrapeOutcome =
  | { status: "no_results"; pagesFetched: number }
  | {
      status: "completed";
      outPath: string;
      total: number;
      withEmail: number;
      withoutEmail: number;
      pagesFetched: number;
      /** 空ページではなく maxPages で止まった場合 true */
      truncated: boolean;
      tables: SheetTable[];
    };

export interface DirectoryScrapeServiceDeps {
  http?: IHttpClient;
  exporter?: SpreadsheetExporter;
  sleep?: SleepFn;
  logger?: Logger;
  /** debug HTML の保存先 (既定: カレントディレクトリ) */
  debugDir?: string;
  /** debug のページ件数出力先 (既定: console.log) */
  print?: (line: string) => void;
}

export class DirectoryScrapeService {
  constructor(
    private readonly config: RuntimeConfig,
    private readonly deps: DirectoryScrapeServiceDeps = {},
  ) {}

  async run(request: ScrapeRequest): Promise<ScrapeOutcome> {
    const { site, delayMs, maxPages } = this.config;
    const runLogger =
      this.deps.logger?.child({ prefecture: request.prefecture }) ??
      createRunLogger(request.prefecture, site.site);

    const http = this.deps.http ?? new HttpClient(site.http, runLogger);
    const driver = new PaginationDriver({
      http,
      parser: new ListingParser(site.selectors, site.search.baseUrl),
      detailFetcher: new DetailFetcher(http, runLogger),
      rateLimiter: new RateLimiter(delayMs, this.deps.sleep),
      search: site.search,
      maxPages,
      logger: runLogger,
      onPage: this.config.debug ? (event) => this.handleDebugPage(event) : undefined,
    });

    logImportant(runLogger, "スクレイピング開始", {
      base_url: site.search.baseUrl,
      delay_ms: delayMs,
      max_pages: maxPages,
    });

    const result = await driver.run(request.prefecture);

    if (result.status === "no_results") {
      runLogger.warn({ pages_fetched: result.pagesFetched }, "検索結果 0 件");
      return { status: "no_results", pagesFetched: result.pagesFetched };
    }

    const aggregated = aggregateRecords(result.records);
    const exporter = this.deps.exporter ?? new SpreadsheetExporter(runLogger);
    const tables = await exporter.write(request.outPath, request.prefecture, aggregated);

    logImportant(runLogger, "スクレイピング完了", {
      total: result.records.length,
      unique: aggregated.unique.length,
      with_email: aggregated.withEmail.length,
      without_email: aggregated.withoutEmail.length,
      duplicates_dropped: aggregated.duplicatesDropped,
      pages_fetched: result.pagesFetched,
    });

    return {
      status: "completed",
      outPath: request.outPath,
      total: aggregated.unique.length,
      withEmail: aggregated.withEmail.length,
      withoutEmail: aggregated.withoutEmail.length,
      pagesFetched: result.pagesFetched,
      truncated: result.status === "page_limit",
      tables,
    };
  }

  private async handleDebugPage(event: PageEvent): Promise<void> {
    const print = this.deps.print ?? ((line: string) => console.log(line));

    if (event.page === 1) {
      const dir = this.deps.debugDir ?? process.cwd();
      await fs.writeFile(path.join(dir, OUTPUT_CONFIG.DEBUG_HTML_FILE), event.html, "utf8");
    }

    print(`page ${event.page}: ${event.recordCount} records`);
  }
}
