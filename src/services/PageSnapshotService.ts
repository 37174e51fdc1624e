/**
 * Page Snapshot Service
 *
 * 目的: セレクタ調整用に検索トップページの HTML とフルページ
 * スクリーンショットを保存する (デバッグツール)
 *
 * ブラウザは playwright-core の Chromium (ブラウザ本体は別途インストール、
 * または CHROMIUM_EXECUTABLE_PATH で指定)
 */

import * as fs from "fs/promises";
import * as path from "path";
import { chromium } from "playwright-core";
import type { SnapshotSettings } from "@/core/domain/SiteConfig";
import { ScrapeError, ScrapeErrorType } from "@/core/domain/ScrapeError";
import { logger as defaultLogger, Logger } from "@/config/logger";

/**
 * 使用する Page の操作 (playwright の Page と互換)
 */
export interface SnapshotPage {
  goto(
    url: string,
    options: { waitUntil: "networkidle"; timeout: number },
  ): Promise<unknown>;
  content(): Promise<string>;
  screenshot(options: { path: string; fullPage: boolean }): Promise<unknown>;
}

export interface SnapshotBrowser {
  newPage(options?: { userAgent?: string }): Promise<SnapshotPage>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<SnapshotBrowser>;

export interface SnapshotResult {
  htmlPath: string;
  screenshotPath: string;
  htmlLength: number;
}

/**
 * 既定のランチャー (headless Chromium)
 */
export const launchChromium: BrowserLauncher = () =>
  chromium.launch({
    headless: true,
    executablePath: process.env.CHROMIUM_EXECUTABLE_PATH || undefined,
  });

export class PageSnapshotService {
  constructor(
    private readonly settings: SnapshotSettings,
    private readonly userAgent: string,
    private readonly launch: BrowserLauncher = launchChromium,
    private readonly logger: Logger = defaultLogger,
  ) {}

  /**
   * 1 ページ目のスナップショットを保存
   * ブラウザは成否にかかわらず必ず閉じる
   */
  async capture(outputDir: string = process.cwd()): Promise<SnapshotResult> {
    const htmlPath = path.join(outputDir, this.settings.htmlFileName);
    const screenshotPath = path.join(outputDir, this.settings.screenshotFileName);

    let browser: SnapshotBrowser;
    try {
      browser = await this.launch();
    } catch (error) {
      throw new ScrapeError(ScrapeErrorType.BROWSER_ERROR, "Failed to launch browser", {
        cause: error,
      });
    }

    try {
      const page = await browser.newPage({ userAgent: this.userAgent });
      await page.goto(this.settings.url, {
        waitUntil: "networkidle",
        timeout: this.settings.timeout,
      });

      const html = await page.content();
      await fs.writeFile(htmlPath, html, "utf8");
      await page.screenshot({ path: screenshotPath, fullPage: true });

      this.logger.info(
        { url: this.settings.url, html_path: htmlPath, screenshot_path: screenshotPath },
        "スナップショット保存完了",
      );

      return { htmlPath, screenshotPath, htmlLength: html.length };
    } catch (error) {
      throw ScrapeError.from(error, ScrapeErrorType.BROWSER_ERROR, this.settings.url);
    } finally {
      try {
        await browser.close();
      } catch (closeError) {
        this.logger.warn({ error: closeError }, "ブラウザ終了に失敗");
      }
    }
  }
}
