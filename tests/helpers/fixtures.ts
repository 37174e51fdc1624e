/**
 * テストフィクスチャ読み込み
 */

import * as fs from "fs";
import * as path from "path";
import { ConfigLoader } from "@/config/ConfigLoader";
import type { SiteConfig } from "@/core/domain/SiteConfig";

const FIXTURE_DIR = path.join(__dirname, "..", "fixtures", "zeirishikensaku");

export const SITE_CONFIG_PATH = path.join(
  __dirname,
  "..",
  "..",
  "config",
  "sites",
  "zeirishikensaku.yaml",
);

export const BASE_URL = "https://www.zeirishikensaku.jp/NzSearchContentPerson";

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(FIXTURE_DIR, name), "utf8");
}

export function loadSiteConfig(): SiteConfig {
  return ConfigLoader.getInstance().loadFromFile(SITE_CONFIG_PATH);
}
