/**
 * CLI 引数パース / 結果メッセージ テスト
 */

import { describe, it, expect } from "@jest/globals";
import { CliArgumentError, parseScrapeArgs, parseSnapshotArgs } from "@/cli/args";
import { formatOutcome, NO_RESULTS_MESSAGE } from "@/cli/scrape";

describe("parseScrapeArgs", () => {
  it("全オプションを解釈すること", () => {
    expect(
      parseScrapeArgs([
        "--pref",
        "静岡",
        "--out",
        "静岡_税理士リスト.xlsx",
        "--delay",
        "1.2",
        "--max-pages",
        "10",
        "--config",
        "site.yaml",
        "--debug",
      ]),
    ).toEqual({
      pref: "静岡",
      out: "静岡_税理士リスト.xlsx",
      delay: 1.2,
      maxPages: 10,
      config: "site.yaml",
      debug: true,
    });
  });

  it("省略時は待機 1 秒・debug なし", () => {
    expect(parseScrapeArgs(["--pref", "愛知", "--out", "a.xlsx"])).toEqual({
      pref: "愛知",
      out: "a.xlsx",
      delay: 1,
      debug: false,
    });
  });

  it("--delay 0 を受け付けること", () => {
    expect(parseScrapeArgs(["--pref", "愛知", "--out", "a.xlsx", "--delay", "0"]).delay).toBe(0);
  });

  it("--pref / --out がなければエラーにすること", () => {
    expect(() => parseScrapeArgs(["--out", "a.xlsx"])).toThrow("--pref は必須です");
    expect(() => parseScrapeArgs(["--pref", "愛知"])).toThrow("--out は必須です");
  });

  it("不正な値はエラーにすること", () => {
    expect(() => parseScrapeArgs(["--pref", "愛知", "--out", "a.xlsx", "--delay=-1"])).toThrow(
      "--delay は 0 以上で指定してください",
    );
    expect(() => parseScrapeArgs(["--pref", "愛知", "--out", "a.xlsx", "--max-pages", "0"])).toThrow(
      "--max-pages は 1 以上で指定してください",
    );
    expect(() => parseScrapeArgs(["--pref", "a/b", "--out", "a.xlsx"])).toThrow(
      "--pref にシート名で使えない文字が含まれています",
    );
  });

  it("シート名にできない県名はエラーにすること", () => {
    expect(() => parseScrapeArgs(["--pref", "'静岡", "--out", "a.xlsx"])).toThrow(
      "--pref の先頭・末尾に ' は使えません",
    );
    // "_全件_メールなしのみ" (11 文字) と合わせて 31 文字まで
    expect(parseScrapeArgs(["--pref", "あ".repeat(20), "--out", "a.xlsx"]).pref).toBe("あ".repeat(20));
    expect(() => parseScrapeArgs(["--pref", "あ".repeat(21), "--out", "a.xlsx"])).toThrow(
      "--pref が長すぎます (シート名は 31 文字まで)",
    );
  });

  it("未知のオプションは CliArgumentError にすること", () => {
    expect(() => parseScrapeArgs(["--pref", "愛知", "--out", "a.xlsx", "--verbose"])).toThrow(
      CliArgumentError,
    );
  });
});

describe("parseSnapshotArgs", () => {
  it("出力先と設定ファイルを解釈すること", () => {
    expect(parseSnapshotArgs(["--out-dir", "./debug", "--config", "site.yaml"])).toEqual({
      outDir: "./debug",
      config: "site.yaml",
    });
    expect(parseSnapshotArgs([])).toEqual({ outDir: undefined, config: undefined });
  });
});

describe("formatOutcome", () => {
  it("0 件ならメッセージを返すこと", () => {
    expect(formatOutcome({ status: "no_results", pagesFetched: 1 })).toBe(NO_RESULTS_MESSAGE);
    expect(NO_RESULTS_MESSAGE).toBe("検索結果が取得できませんでした。");
  });

  it("完了時は出力先を返すこと", () => {
    expect(
      formatOutcome({
        status: "completed",
        outPath: "静岡_税理士リスト.xlsx",
        total: 0,
        withEmail: 0,
        withoutEmail: 0,
        pagesFetched: 2,
        truncated: false,
        tables: [],
      }),
    ).toBe("Done. -> 静岡_税理士リスト.xlsx");
  });
});
