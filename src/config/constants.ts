/**
 * アプリケーション設定定数
 *
 * 環境変数がなければ既定値を使う
 */

/**
 * アプリケーションメタデータ
 * package.json の version と手動で同期する
 */
export const APP_METADATA = {
  VERSION: "1.0.0",
  NAME: "Zeirishi Directory Scraper",
} as const;

/**
 * 既定のサイト設定名 (config/sites/{name}.yaml)
 */
export const DEFAULT_SITE = "zeirishikensaku";

/**
 * スクレイピング既定値
 */
export const SCRAPER_DEFAULTS = {
  /**
   * 一覧ページ間の待機秒数
   * 環境変数: SCRAPE_DELAY_SEC
   */
  DELAY_SEC: parseNonNegative(process.env.SCRAPE_DELAY_SEC, 1.0),

  /**
   * HTTP タイムアウト (ms)。YAML の http.timeout より優先
   * 環境変数: HTTP_TIMEOUT_MS
   */
  HTTP_TIMEOUT_MS: parsePositiveInt(process.env.HTTP_TIMEOUT_MS),
} as const;

/**
 * 出力関連の定数
 */
export const OUTPUT_CONFIG = {
  /** メール未検出時の表示値 */
  NO_EMAIL_SENTINEL: "記載なし",

  /** --debug 時に 1 ページ目の HTML を保存するファイル名 */
  DEBUG_HTML_FILE: "debug_first_page.html",

  /** 登録年日トークンの区切り */
  ERA_SEPARATOR: "／",
} as const;

/**
 * Excel 出力列 (順序固定)
 */
export const EXPORT_COLUMNS = [
  { key: "prefecture", header: "県" },
  { key: "officeName", header: "事務所名" },
  { key: "representativeName", header: "代表者名" },
  { key: "phone", header: "電話番号" },
  { key: "email", header: "メールアドレス" },
  { key: "address", header: "住所" },
  { key: "registrationEra", header: "登録年日（平成/令和）" },
] as const;

export type ExportColumnKey = (typeof EXPORT_COLUMNS)[number]["key"];

/**
 * Excel のシート名の最大長
 */
export const SHEET_NAME_MAX_LENGTH = 31;

/**
 * シート名
 */
export const SHEET_NAMES = {
  withoutEmail: (prefecture: string) => `${prefecture}_全件_メールなしのみ`,
  withEmail: (prefecture: string) => `${prefecture}_メールあり`,
} as const;

function parseNonNegative(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function parsePositiveInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}
