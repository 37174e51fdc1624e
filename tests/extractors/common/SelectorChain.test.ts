/**
 * SelectorChain テスト
 */

import { describe, it, expect } from "@jest/globals";
import * as cheerio from "cheerio";
import { SelectorChain, cssText } from "@/extractors/common/SelectorChain";

function card(html: string) {
  const $ = cheerio.load(`<div class="card">${html}</div>`);
  return $(".card").first();
}

describe("SelectorChain", () => {
  it("優先順で最初に一致したセレクタのテキストを返すこと", () => {
    const chain = SelectorChain.ofText([".a", ".b"]);

    expect(chain.resolve(card('<p class="b">B</p><p class="a"> A </p>'))).toEqual({
      found: true,
      value: "A",
    });
  });

  it("空の一致は飛ばして次の候補を使うこと", () => {
    const chain = SelectorChain.ofText([".a", ".b"]);

    expect(chain.resolve(card('<p class="a">  </p><p class="b">B</p>'))).toEqual({
      found: true,
      value: "B",
    });
  });

  it("一致が空だけなら found の空文字を返すこと", () => {
    const chain = SelectorChain.ofText([".a", ".b"]);

    expect(chain.resolve(card('<p class="a"></p>'))).toEqual({ found: true, value: "" });
  });

  it("どれも一致しなければ not found を返すこと", () => {
    const chain = SelectorChain.ofText([".a", ".b"]);

    expect(chain.resolve(card("<p>none</p>"))).toEqual({ found: false });
  });

  it("属性チェーンは最初の要素の属性値を返すこと", () => {
    const chain = SelectorChain.ofAttr(["a[href]"], "href");

    expect(chain.resolve(card('<a>no</a><a href="/x">x</a><a href="/y">y</a>'))).toEqual({
      found: true,
      value: "/x",
    });
  });

  it("任意のマッチャー関数を組み合わせられること", () => {
    const chain = new SelectorChain([() => null, cssText("span")]);

    expect(chain.resolve(card("<span>S</span>"))).toEqual({ found: true, value: "S" });
  });
});
