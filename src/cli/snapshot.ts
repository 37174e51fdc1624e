#!/usr/bin/env node
/**
 * 検索ページ スナップショット CLI
 *
 * ブラウザで検索サイトを開き、HTML とスクリーンショットを保存する
 * (一覧のセレクタ調整用)
 *
 * 使用法:
 *   npm run snapshot
 *   npm run snapshot -- --out-dir ./debug
 */

import "dotenv/config";
import { ConfigLoader } from "@/config/ConfigLoader";
import { DEFAULT_SITE } from "@/config/constants";
import { logger } from "@/config/logger";
import { ScrapeError } from "@/core/domain/ScrapeError";
import { PageSnapshotService } from "@/services/PageSnapshotService";
import {
  CliArgumentError,
  parseSnapshotArgs,
  SNAPSHOT_USAGE,
  type SnapshotArgs,
} from "@/cli/args";

async function main(argv: string[]): Promise<number> {
  let args: SnapshotArgs;
  try {
    args = parseSnapshotArgs(argv);
  } catch (error) {
    if (error instanceof CliArgumentError) {
      console.error(error.message);
      console.error(SNAPSHOT_USAGE);
      return 1;
    }
    throw error;
  }

  try {
    const loader = ConfigLoader.getInstance();
    const site = args.config ? loader.loadFromFile(args.config) : loader.loadConfig(DEFAULT_SITE);
    const service = new PageSnapshotService(site.snapshot, site.http.userAgent);
    const result = await service.capture(args.outDir);

    console.log(`HTML: ${result.htmlPath}`);
    console.log(`Screenshot: ${result.screenshotPath}`);
    return 0;
  } catch (error) {
    if (error instanceof ScrapeError) {
      logger.error(error.toLogObject(), "スナップショット失敗");
      console.error(`エラー: ${error.message}`);
    } else {
      logger.error({ error }, "予期しないエラー");
      console.error(error);
    }
    return 1;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
