/**
 * ライブラリとしての公開 API
 */

export { normalizeEra, extractEraDates } from "@/extractors/common/EraNormalizer";
export {
  extractEmailFromHtml,
  extractEmailFromText,
} from "@/extractors/common/EmailExtractor";
export { SelectorChain, cssText, cssAttr } from "@/extractors/common/SelectorChain";
export { ListingParser } from "@/extractors/ListingParser";
export { HttpClient } from "@/scanners/HttpClient";
export { DetailFetcher } from "@/scanners/DetailFetcher";
export { PaginationDriver } from "@/services/PaginationDriver";
export { aggregateRecords, dedupeBy } from "@/services/RecordAggregator";
export { SpreadsheetExporter, toExportRow } from "@/services/SpreadsheetExporter";
export { DirectoryScrapeService } from "@/services/DirectoryScrapeService";
export { PageSnapshotService } from "@/services/PageSnapshotService";
export { ConfigLoader } from "@/config/ConfigLoader";
export { createRuntimeConfig } from "@/config/RuntimeConfig";
export { ScrapeError, ScrapeErrorType } from "@/core/domain/ScrapeError";

export type {
  ListingRecord,
  ParsedListing,
  EmailLookup,
  ListingField,
} from "@/core/domain/ListingRecord";
export type { SiteConfig } from "@/core/domain/SiteConfig";
export type { RuntimeConfig } from "@/config/RuntimeConfig";
export type { IHttpClient, HttpResponse } from "@/core/interfaces/IHttpClient";
export type { PaginationResult, PaginationStatus } from "@/services/PaginationDriver";
export type { AggregatedRecords } from "@/services/RecordAggregator";
export type { ScrapeOutcome } from "@/services/DirectoryScrapeService";
