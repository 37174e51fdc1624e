/**
 * RecordAggregator
 *
 * 1. (事務所名, 電話番号) で重複除外 (最初の出現を残す)
 * 2. メールあり / なしに分割
 * 3. メールありはさらに事務所名のみで重複除外
 *    (メールが分かれば同一事務所の別連絡先は不要)
 */

import type { ListingRecord } from "@/core/domain/ListingRecord";
import { hasEmail } from "@/core/domain/ListingRecord";

export interface AggregatedRecords {
  /** (事務所名, 電話番号) で重複除外した全レコード */
  unique: ListingRecord[];
  withEmail: ListingRecord[];
  withoutEmail: ListingRecord[];
  /** 重複として除外した件数 (両段階の合計) */
  duplicatesDropped: number;
}

/**
 * キー関数で重複除外 (出現順を維持し、最初の出現を残す)
 */
export function dedupeBy<T>(items: readonly T[], keyOf: (item: T) => string): T[] {
  const seen = new Set<string>();
  const result: T[] = [];

  for (const item of items) {
    const key = keyOf(item);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(item);
  }

  return result;
}

/**
 * 複合キー (区切りが値に含まれても衝突しないよう JSON 化)
 */
export function officePhoneKey(record: ListingRecord): string {
  return JSON.stringify([record.officeName, record.phone]);
}

export function aggregateRecords(records: readonly ListingRecord[]): AggregatedRecords {
  const unique = dedupeBy(records, officePhoneKey);

  const withEmailAll = unique.filter(hasEmail);
  const withoutEmail = unique.filter((r) => !hasEmail(r));
  const withEmail = dedupeBy(withEmailAll, (r) => r.officeName);

  return {
    unique,
    withEmail,
    withoutEmail,
    duplicatesDropped:
      records.length - unique.length + (withEmailAll.length - withEmail.length),
  };
}
