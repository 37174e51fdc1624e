/**
 * EraNormalizer
 *
 * 目的: 登録年月日テキストから平成/令和の和暦日付だけを抜き出す
 *
 * 例: "平成 31年 3月 引き続き 令和2年" → "平成31年3月／令和2年"
 */

import { OUTPUT_CONFIG } from "@/config/constants";

/**
 * (平成|令和) 年 [月]
 * - トークン間の空白 (全角含む) は許容
 * - 数字は半角/全角、年は「元」も可
 * - 「年」がない断片や他の元号は一致しない
 */
const ERA_DATE_PATTERN =
  /(?:平成|令和)\s*(?:[0-9０-９]+|元)\s*年(?:\s*[0-9０-９]+\s*月)?/g;

/**
 * 和暦日付トークンを出現順に「／」で連結
 *
 * @returns 一致がなければ空文字
 */
export function normalizeEra(text: string): string {
  return extractEraDates(text).join(OUTPUT_CONFIG.ERA_SEPARATOR);
}

/**
 * 和暦日付トークンを出現順に取得 (トークン内の空白は除去)
 */
export function extractEraDates(text: string): string[] {
  const matches = text.match(ERA_DATE_PATTERN) ?? [];
  return matches.map((m) => m.replace(/\s+/g, ""));
}
