/**
 * EmailExtractor
 *
 * 目的: 詳細ページからメールアドレスを 1 件推定する
 *
 * 戦略:
 * 1. a[href^="mailto:"] を優先
 * 2. なければ可視テキストを正規表現で走査 (最初の一致)
 *
 * RFC 5322 の検証ではない。難読化されたアドレスの取りこぼしは許容し、
 * local@domain.tld の形に一致しないものは返さない。
 */

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { hasChildren, isTag, isText } from "domhandler";
import type { AnyNode } from "domhandler";

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;

const MAILTO_PREFIX = /^mailto:/i;

/** テキスト化の対象外とするタグ */
const NON_VISIBLE_TAGS = new Set(["script", "style", "noscript", "template"]);

/**
 * HTML ドキュメントからメールアドレスを抽出
 *
 * @returns 見つからなければ空文字
 */
export function extractEmailFromHtml(html: string): string {
  const $ = cheerio.load(html);

  const fromMailto = findMailtoAddress($);
  if (fromMailto) {
    return fromMailto;
  }

  return extractEmailFromText(flattenVisibleText($));
}

/**
 * テキストからメールアドレスらしき文字列を抽出 (最初の一致)
 */
export function extractEmailFromText(text: string): string {
  const match = text.match(EMAIL_PATTERN);
  return match ? match[0] : "";
}

/**
 * 最初の mailto リンクのアドレス部分
 * "mailto:" と ?subject= などのクエリを除き、前後の空白を除去
 */
function findMailtoAddress($: CheerioAPI): string {
  const href = $('a[href^="mailto:"]').first().attr("href");
  if (!href) {
    return "";
  }

  const withoutPrefix = href.replace(MAILTO_PREFIX, "");
  const queryIndex = withoutPrefix.indexOf("?");
  const address = queryIndex >= 0 ? withoutPrefix.slice(0, queryIndex) : withoutPrefix;
  return address.trim();
}

/**
 * 可視テキストを空白区切りで連結
 * テキストノードごとに trim し、空のものは捨てる
 */
export function flattenVisibleText($: CheerioAPI): string {
  const parts: string[] = [];
  const root = $.root().get(0);
  if (root) {
    collectText(root, parts);
  }
  return parts.join(" ");
}

function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    const text = node.data.trim();
    if (text) {
      parts.push(text);
    }
    return;
  }

  if (isTag(node) && NON_VISIBLE_TAGS.has(node.name)) {
    return;
  }

  if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, parts);
    }
  }
}
