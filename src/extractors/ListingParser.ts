/**
 * ListingParser
 *
 * 目的: 検索結果 1 ページ分の HTML → 一覧カードごとの ParsedListing
 *
 * 戦略:
 * 1. カードはセレクタ候補のいずれかに一致すれば採用 (文書順)
 * 2. 項目ごとに SelectorChain で優先順に抽出。見つからなければ空文字
 * 3. 登録年日は必ず EraNormalizer を通す
 * 4. 最初の a[href] を詳細リンクとし、検索 URL 基準で絶対 URL 化
 *
 * 0 件は「次のページなし」を意味する
 */

import * as cheerio from "cheerio";
import type { Cheerio } from "cheerio";
import { isTag, type Element } from "domhandler";
import {
  LISTING_FIELDS,
  type ListingField,
  type ParsedListing,
} from "@/core/domain/ListingRecord";
import type { ListingSelectors } from "@/core/domain/SiteConfig";
import { SelectorChain } from "@/extractors/common/SelectorChain";
import { normalizeEra } from "@/extractors/common/EraNormalizer";

type FieldChains = Record<ListingField, SelectorChain>;

export class ListingParser {
  private readonly cardSelector: string;
  private readonly fieldChains: FieldChains;
  private readonly detailLinkChain: SelectorChain;

  constructor(
    selectors: ListingSelectors,
    private readonly baseUrl: string,
  ) {
    this.cardSelector = selectors.card.join(", ");
    this.fieldChains = {
      officeName: SelectorChain.ofText(selectors.officeName),
      representativeName: SelectorChain.ofText(selectors.representativeName),
      phone: SelectorChain.ofText(selectors.phone),
      address: SelectorChain.ofText(selectors.address),
      registrationEra: SelectorChain.ofText(selectors.registrationEra),
    };
    this.detailLinkChain = SelectorChain.ofAttr(selectors.detailLink, "href");
  }

  /**
   * 1 ページ分の HTML をパース
   */
  parse(html: string): ParsedListing[] {
    const $ = cheerio.load(html);
    const listings: ParsedListing[] = [];

    $(this.cardSelector).each((_index, el) => {
      if (isTag(el)) {
        listings.push(this.parseCard($(el)));
      }
    });

    return listings;
  }

  private parseCard(card: Cheerio<Element>): ParsedListing {
    const values: Record<ListingField, string> = {
      officeName: "",
      representativeName: "",
      phone: "",
      address: "",
      registrationEra: "",
    };
    const missingFields: ListingField[] = [];

    for (const field of LISTING_FIELDS) {
      const result = this.fieldChains[field].resolve(card);
      if (result.found) {
        values[field] = result.value;
      } else {
        missingFields.push(field);
      }
    }

    return {
      ...values,
      registrationEra: normalizeEra(values.registrationEra),
      detailUrl: this.resolveDetailUrl(card),
      missingFields,
    };
  }

  /**
   * 詳細リンクを絶対 URL に解決
   * http(s) 以外 (javascript:, mailto: など) や不正な href は null
   */
  private resolveDetailUrl(card: Cheerio<Element>): string | null {
    const link = this.detailLinkChain.resolve(card);
    if (!link.found || link.value === "") {
      return null;
    }

    try {
      const url = new URL(link.value, this.baseUrl);
      if (url.protocol !== "http:" && url.protocol !== "https:") {
        return null;
      }
      return url.toString();
    } catch {
      // 解決できない href はリンクなし扱い
      return null;
    }
  }
}
