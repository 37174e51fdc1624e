/**
 * 実行時設定
 *
 * 起動時に一度だけ組み立て、各コンポーネントへ明示的に渡す (凍結済み)
 */

import type { SiteConfig } from "@/core/domain/SiteConfig";
import { SCRAPER_DEFAULTS } from "@/config/constants";

export interface RuntimeConfig {
  readonly site: SiteConfig;
  /** 一覧ページ間の待機 (ms) */
  readonly delayMs: number;
  /** 一覧ページ取得の上限。未指定なら空ページまで */
  readonly maxPages?: number;
  readonly debug: boolean;
}

export interface RuntimeConfigOptions {
  delaySec?: number;
  maxPages?: number;
  debug?: boolean;
  /** HTTP タイムアウト上書き (ms) */
  timeoutMs?: number;
}

export function createRuntimeConfig(
  site: SiteConfig,
  options: RuntimeConfigOptions = {},
): RuntimeConfig {
  const timeout = options.timeoutMs ?? SCRAPER_DEFAULTS.HTTP_TIMEOUT_MS ?? site.http.timeout;
  const delaySec = options.delaySec ?? SCRAPER_DEFAULTS.DELAY_SEC;

  return deepFreeze({
    site: {
      ...site,
      http: { ...site.http, timeout },
    },
    delayMs: Math.round(delaySec * 1000),
    maxPages: options.maxPages,
    debug: options.debug ?? false,
  });
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
