#!/usr/bin/env node
/**
 * 税理士検索 スクレイピング CLI
 *
 * 都道府県を指定して一覧を取得し、メールあり/なしで Excel に保存する
 *
 * 使用法:
 *   npm run scrape -- --pref 静岡 --out 静岡_税理士リスト.xlsx --delay 1.2
 *
 * 注意: 対象サイトの利用規約・robots.txt を必ず守ること
 */

import "dotenv/config";
import { ConfigLoader } from "@/config/ConfigLoader";
import { createRuntimeConfig } from "@/config/RuntimeConfig";
import { DEFAULT_SITE } from "@/config/constants";
import { logger } from "@/config/logger";
import { ScrapeError } from "@/core/domain/ScrapeError";
import {
  DirectoryScrapeService,
  type ScrapeOutcome,
} from "@/services/DirectoryScrapeService";
import {
  CliArgumentError,
  parseScrapeArgs,
  SCRAPE_USAGE,
  type ScrapeArgs,
} from "@/cli/args";

export const NO_RESULTS_MESSAGE = "検索結果が取得できませんでした。";

export function formatOutcome(outcome: ScrapeOutcome): string {
  if (outcome.status === "no_results") {
    return NO_RESULTS_MESSAGE;
  }
  return `Done. -> ${outcome.outPath}`;
}

export async function main(argv: string[]): Promise<number> {
  let args: ScrapeArgs;
  try {
    args = parseScrapeArgs(argv);
  } catch (error) {
    if (error instanceof CliArgumentError) {
      console.error(error.message);
      console.error(SCRAPE_USAGE);
      return 1;
    }
    throw error;
  }

  try {
    const loader = ConfigLoader.getInstance();
    const site = args.config ? loader.loadFromFile(args.config) : loader.loadConfig(DEFAULT_SITE);
    const config = createRuntimeConfig(site, {
      delaySec: args.delay,
      maxPages: args.maxPages,
      debug: args.debug,
    });

    const service = new DirectoryScrapeService(config);
    const outcome = await service.run({ prefecture: args.pref, outPath: args.out });

    console.log(formatOutcome(outcome));
    return 0;
  } catch (error) {
    if (error instanceof ScrapeError) {
      logger.error(error.toLogObject(), "スクレイピング失敗");
      console.error(`エラー: ${error.message}`);
    } else {
      logger.error({ error }, "予期しないエラー");
      console.error(error);
    }
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
