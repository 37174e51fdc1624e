/**
 * DirectoryScrapeService 結合テスト
 * 一覧 → 詳細 → 重複除外 → Excel 出力 (ネットワークなし)
 */

import { describe, it, expect, beforeEach, afterEach, jest } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import pino from "pino";
import { DirectoryScrapeService } from "@/services/DirectoryScrapeService";
import { createRuntimeConfig } from "@/config/RuntimeConfig";
import type { IHttpClient } from "@/core/interfaces/IHttpClient";
import { FakeHttpClient } from "../helpers/FakeHttpClient";
import { createDirectoryHttp } from "../helpers/directoryFixture";
import { BASE_URL, loadSiteConfig, readFixture } from "../helpers/fixtures";

const HEADERS = [
  "県",
  "事務所名",
  "代表者名",
  "電話番号",
  "メールアドレス",
  "住所",
  "登録年日（平成/令和）",
];

const silent = pino({ level: "silent" });
const noSleep = async (): Promise<void> => {};

describe("DirectoryScrapeService", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "directory-scrape-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function createService(http: IHttpClient, options: { debug?: boolean; print?: (line: string) => void } = {}) {
    const config = createRuntimeConfig(loadSiteConfig(), { delaySec: 0, debug: options.debug });
    return new DirectoryScrapeService(config, {
      http,
      sleep: noSleep,
      logger: silent,
      debugDir: tmpDir,
      print: options.print,
    });
  }

  it("県の全ページを取得し、重複除外してメールあり/なしの 2 シートに出力すること", async () => {
    const outPath = path.join(tmpDir, "静岡_税理士リスト.xlsx");
    const service = createService(createDirectoryHttp());

    const outcome = await service.run({ prefecture: "静岡", outPath });

    expect(outcome.status).toBe("completed");
    if (outcome.status !== "completed") return;

    expect(outcome.total).toBe(5);
    expect(outcome.withEmail).toBe(2);
    expect(outcome.withoutEmail).toBe(2);
    expect(outcome.pagesFetched).toBe(3);
    expect(outcome.truncated).toBe(false);
    expect(fs.existsSync(outPath)).toBe(true);

    expect(outcome.tables).toEqual([
      {
        name: "静岡_全件_メールなしのみ",
        headers: HEADERS,
        rows: [
          ["静岡", "", "", "054-000-0003", "記載なし", "静岡県沼津市例町3-3", ""],
          [
            "静岡",
            "佐藤税務会計",
            "佐藤 次郎",
            "054-000-0004",
            "記載なし",
            "静岡県富士市見本4-4",
            "平成元年",
          ],
        ],
      },
      {
        name: "静岡_メールあり",
        headers: HEADERS,
        rows: [
          [
            "静岡",
            "山田税理士事務所",
            "山田 太郎",
            "054-000-0001",
            "yamada@example.jp",
            "静岡県静岡市葵区テスト町1-1",
            "平成15年4月／令和3年",
          ],
          [
            "静岡",
            "鈴木会計事務所",
            "鈴木 花子",
            "054-000-0002",
            "suzuki.office@example.co.jp",
            "静岡県浜松市中区サンプル2-2",
            "令和2年10月",
          ],
        ],
      },
    ]);
  });

  it("同じ応答に対して再実行すると同じ表になること", async () => {
    const first = await createService(createDirectoryHttp()).run({
      prefecture: "静岡",
      outPath: path.join(tmpDir, "first.xlsx"),
    });
    const second = await createService(createDirectoryHttp()).run({
      prefecture: "静岡",
      outPath: path.join(tmpDir, "second.xlsx"),
    });

    expect(first.status).toBe("completed");
    expect(second).toEqual({ ...first, outPath: path.join(tmpDir, "second.xlsx") });
  });

  it("1 ページ目が空ならファイルを書かずに no_results を返すこと", async () => {
    const outPath = path.join(tmpDir, "none.xlsx");
    const http = new FakeHttpClient({
      baseUrl: BASE_URL,
      listingPages: [],
      emptyPage: readFixture("list_empty.html"),
    });

    const outcome = await createService(http).run({ prefecture: "静岡", outPath });

    expect(outcome).toEqual({ status: "no_results", pagesFetched: 1 });
    expect(fs.existsSync(outPath)).toBe(false);
  });

  it("debug 時は 1 ページ目の HTML を保存し、ページごとの件数を出力すること", async () => {
    const print = jest.fn<(line: string) => void>();
    const service = createService(createDirectoryHttp(), { debug: true, print });

    await service.run({ prefecture: "静岡", outPath: path.join(tmpDir, "debug.xlsx") });

    expect(fs.readFileSync(path.join(tmpDir, "debug_first_page.html"), "utf8")).toBe(
      readFixture("list_page1.html"),
    );
    expect(print.mock.calls).toEqual([
      ["page 1: 3 records"],
      ["page 2: 3 records"],
      ["page 3: 0 records"],
    ]);
  });

  it("debug でなければ HTML を保存しないこと", async () => {
    const print = jest.fn<(line: string) => void>();
    const service = createService(createDirectoryHttp(), { print });

    await service.run({ prefecture: "静岡", outPath: path.join(tmpDir, "quiet.xlsx") });

    expect(fs.existsSync(path.join(tmpDir, "debug_first_page.html"))).toBe(false);
    expect(print).not.toHaveBeenCalled();
  });
});
