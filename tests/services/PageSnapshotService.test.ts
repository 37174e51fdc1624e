/**
 * PageSnapshotService テスト (ブラウザはフェイク)
 */

import { describe, it, expect, beforeEach, afterEach, jest } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import pino from "pino";
import {
  PageSnapshotService,
  type SnapshotBrowser,
  type SnapshotPage,
} from "@/services/PageSnapshotService";
import type { SnapshotSettings } from "@/core/domain/SiteConfig";
import { ScrapeErrorType } from "@/core/domain/ScrapeError";

const SETTINGS: SnapshotSettings = {
  url: "https://example.jp/search",
  htmlFileName: "first_page.html",
  screenshotFileName: "first_page.png",
  timeout: 30000,
};

function createFakeBrowser(gotoImpl?: SnapshotPage["goto"]) {
  const page = {
    goto: jest.fn<SnapshotPage["goto"]>().mockImplementation(gotoImpl ?? (async () => null)),
    content: jest.fn<SnapshotPage["content"]>().mockResolvedValue("<html>snapshot</html>"),
    screenshot: jest.fn<SnapshotPage["screenshot"]>().mockResolvedValue(Buffer.from("png")),
  } satisfies SnapshotPage;
  const browser = {
    newPage: jest.fn<SnapshotBrowser["newPage"]>().mockResolvedValue(page),
    close: jest.fn<SnapshotBrowser["close"]>().mockResolvedValue(undefined),
  } satisfies SnapshotBrowser;
  return { page, browser };
}

describe("PageSnapshotService", () => {
  const silent = pino({ level: "silent" });
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "snapshot-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("HTML とフルページのスクリーンショットを保存し、ブラウザを閉じること", async () => {
    const { page, browser } = createFakeBrowser();
    const service = new PageSnapshotService(SETTINGS, "test-agent", async () => browser, silent);

    const result = await service.capture(tmpDir);

    expect(result).toEqual({
      htmlPath: path.join(tmpDir, "first_page.html"),
      screenshotPath: path.join(tmpDir, "first_page.png"),
      htmlLength: "<html>snapshot</html>".length,
    });
    expect(fs.readFileSync(result.htmlPath, "utf8")).toBe("<html>snapshot</html>");
    expect(browser.newPage).toHaveBeenCalledWith({ userAgent: "test-agent" });
    expect(page.goto).toHaveBeenCalledWith("https://example.jp/search", {
      waitUntil: "networkidle",
      timeout: 30000,
    });
    expect(page.screenshot).toHaveBeenCalledWith({
      path: path.join(tmpDir, "first_page.png"),
      fullPage: true,
    });
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  it("ページ操作に失敗しても必ずブラウザを閉じ、BROWSER_ERROR にすること", async () => {
    const { browser } = createFakeBrowser(async () => {
      throw new Error("net::ERR_NAME_NOT_RESOLVED");
    });
    const service = new PageSnapshotService(SETTINGS, "test-agent", async () => browser, silent);

    await expect(service.capture(tmpDir)).rejects.toMatchObject({
      type: ScrapeErrorType.BROWSER_ERROR,
      message: "net::ERR_NAME_NOT_RESOLVED",
      url: "https://example.jp/search",
    });
    expect(browser.close).toHaveBeenCalledTimes(1);
    expect(fs.existsSync(path.join(tmpDir, "first_page.html"))).toBe(false);
  });

  it("ブラウザ起動の失敗は BROWSER_ERROR にすること", async () => {
    const service = new PageSnapshotService(
      SETTINGS,
      "test-agent",
      async () => {
        throw new Error("Executable doesn't exist");
      },
      silent,
    );

    await expect(service.capture(tmpDir)).rejects.toMatchObject({
      type: ScrapeErrorType.BROWSER_ERROR,
      message: "Failed to launch browser",
    });
  });
});
