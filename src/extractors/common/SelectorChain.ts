/**
 * SelectorChain
 *
 * 目的: 「セレクタ A、なければ B、なければ C」を明示的な戦略リストで表現
 * パターン: Chain of Responsibility (優先順に試行、最初の非空一致を採用)
 */

import type { Cheerio } from "cheerio";
import type { Element } from "domhandler";

/**
 * マッチャーの結果
 * - null: 要素が見つからない
 * - 文字列: 要素は見つかった (空文字の可能性あり)
 */
export type FieldMatcher = (scope: Cheerio<Element>) => string | null;

export type ChainResult =
  | { readonly found: true; readonly value: string }
  | { readonly found: false };

/**
 * CSS セレクタに一致する最初の要素の trim 済みテキスト
 */
export function cssText(selector: string): FieldMatcher {
  return (scope) => {
    const el = scope.find(selector).first();
    if (el.length === 0) {
      return null;
    }
    return el.text().trim();
  };
}

/**
 * CSS セレクタに一致する最初の要素の属性値
 */
export function cssAttr(selector: string, attribute: string): FieldMatcher {
  return (scope) => {
    const el = scope.find(selector).first();
    if (el.length === 0) {
      return null;
    }
    const value = el.attr(attribute);
    return value === undefined ? null : value.trim();
  };
}

export class SelectorChain {
  constructor(private readonly matchers: readonly FieldMatcher[]) {}

  /**
   * セレクタ文字列のリストからテキスト抽出チェーンを生成
   */
  static ofText(selectors: readonly string[]): SelectorChain {
    return new SelectorChain(selectors.map(cssText));
  }

  /**
   * セレクタ文字列のリストから属性抽出チェーンを生成
   */
  static ofAttr(selectors: readonly string[], attribute: string): SelectorChain {
    return new SelectorChain(selectors.map((s) => cssAttr(s, attribute)));
  }

  /**
   * 優先順に試行
   *
   * 最初の非空の値を返す。要素は見つかったが全て空なら空文字 (found)、
   * どのマッチャーも要素を見つけられなければ not found
   */
  resolve(scope: Cheerio<Element>): ChainResult {
    let matchedEmpty = false;

    for (const matcher of this.matchers) {
      const value = matcher(scope);
      if (value === null) {
        continue;
      }
      if (value !== "") {
        return { found: true, value };
      }
      matchedEmpty = true;
    }

    return matchedEmpty ? { found: true, value: "" } : { found: false };
  }
}
