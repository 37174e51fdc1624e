/**
 * サイト YAML 設定ローダー
 * Singleton Pattern
 *
 * 役割:
 * - config/sites/*.yaml の読み込み
 * - SiteConfig スキーマ検証 (Zod)
 * - 設定キャッシュ
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { SiteConfig, SiteConfigSchema } from "@/core/domain/SiteConfig";
import { ScrapeError, ScrapeErrorType } from "@/core/domain/ScrapeError";
import { logger } from "@/config/logger";

/**
 * 設定ディレクトリ (src/config と dist/config のどちらからでも解決できる)
 */
function getSiteConfigDir(): string {
  return (
    process.env.SITE_CONFIG_DIR ||
    path.resolve(__dirname, "..", "..", "config", "sites")
  );
}

/**
 * Site Config Loader (Singleton)
 */
export class ConfigLoader {
  private static instance: ConfigLoader;
  private configCache: Map<string, SiteConfig> = new Map();

  private constructor() {}

  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  /**
   * サイト名から設定を読み込む
   * @param site サイト名 (例: "zeirishikensaku")
   */
  loadConfig(site: string): SiteConfig {
    const configPath = path.join(getSiteConfigDir(), `${site}.yaml`);
    return this.loadFromFile(configPath);
  }

  /**
   * ファイルパスを指定して設定を読み込む
   */
  loadFromFile(configPath: string): SiteConfig {
    const resolved = path.resolve(configPath);
    const cached = this.configCache.get(resolved);
    if (cached) {
      return cached;
    }

    if (!fs.existsSync(resolved)) {
      throw new ScrapeError(
        ScrapeErrorType.CONFIG_INVALID,
        `Site config file not found: ${resolved}`,
      );
    }

    const fileContent = fs.readFileSync(resolved, "utf8");
    const config = this.parse(fileContent, resolved);

    this.configCache.set(resolved, config);
    return config;
  }

  /**
   * YAML 文字列をパースして検証
   */
  parse(fileContent: string, source: string = "<inline>"): SiteConfig {
    let rawConfig: unknown;
    try {
      rawConfig = yaml.load(fileContent);
    } catch (error) {
      throw ScrapeError.from(error, ScrapeErrorType.CONFIG_INVALID);
    }

    const parseResult = SiteConfigSchema.safeParse(rawConfig);
    if (!parseResult.success) {
      logger.error(
        { source, errors: parseResult.error.errors },
        "サイト設定の検証に失敗",
      );
      throw new ScrapeError(
        ScrapeErrorType.CONFIG_INVALID,
        `Invalid site config (${source}): ${parseResult.error.errors
          .map((e) => `${e.path.join(".")}: ${e.message}`)
          .join(", ")}`,
      );
    }

    return parseResult.data;
  }

  /**
   * キャッシュクリア (テスト用)
   */
  clearCache(): void {
    this.configCache.clear();
  }
}
