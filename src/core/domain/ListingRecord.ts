/**
 * ListingRecord - 一覧 1 件分のドメインモデル
 *
 * ライフサイクル:
 * 1. ListingParser がカードごとに ParsedListing を生成
 * 2. PaginationDriver が県名とメール検索結果を付与して ListingRecord を生成
 * 3. 以降は不変 (readonly)。出力または重複除外で破棄
 */

/**
 * カードから抽出する 5 項目
 */
export const LISTING_FIELDS = [
  "officeName",
  "representativeName",
  "phone",
  "address",
  "registrationEra",
] as const;

export type ListingField = (typeof LISTING_FIELDS)[number];

/**
 * 一覧カード 1 件のパース結果 (メール未取得)
 */
export interface ParsedListing {
  readonly officeName: string;
  readonly representativeName: string;
  readonly phone: string;
  readonly address: string;
  /** 平成/令和の日付トークンを「／」で連結した文字列 */
  readonly registrationEra: string;
  /** 詳細ページの絶対 URL。リンクがなければ null (メール検索なし) */
  readonly detailUrl: string | null;
  /** セレクタが一致しなかった項目 (空文字で取得できた項目とは区別する) */
  readonly missingFields: readonly ListingField[];
}

/**
 * メール未検出の理由
 */
export type EmailNotFoundReason = "no_detail_url" | "fetch_failed" | "not_on_page";

/**
 * メール検索結果
 */
export type EmailLookup =
  | { readonly status: "found"; readonly address: string }
  | { readonly status: "not_found"; readonly reason: EmailNotFoundReason };

/**
 * 県名・メール付与済みレコード
 */
export interface ListingRecord extends ParsedListing {
  readonly prefecture: string;
  readonly email: EmailLookup;
}

/**
 * ParsedListing から ListingRecord を生成
 */
export function toListingRecord(
  listing: ParsedListing,
  prefecture: string,
  email: EmailLookup,
): ListingRecord {
  return { ...listing, prefecture, email };
}

export function hasEmail(
  record: ListingRecord,
): record is ListingRecord & { email: { status: "found"; address: string } } {
  return record.email.status === "found";
}
