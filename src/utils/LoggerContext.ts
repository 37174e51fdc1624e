/**
 * ロガーコンテキストユーティリティ
 */

import { logger, Logger } from "@/config/logger";

/**
 * 実行 (県単位) 用ロガー
 */
export function createRunLogger(prefecture: string, site: string): Logger {
  return logger.child({ prefecture, site });
}

/**
 * ページ用ロガー
 */
export function createPageLogger(parent: Logger, page: number): Logger {
  return parent.child({ page });
}

/**
 * 重要な情報のログ
 */
export function logImportant(
  target: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  target.info({ ...data, important: true }, message);
}
