/**
 * Rate Limiter
 *
 * 一覧ページ取得の間に固定時間待機する (相手サーバーへの配慮)
 */

import { logger } from "@/config/logger";

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class RateLimiter {
  constructor(
    private readonly waitTimeMs: number,
    private readonly sleepFn: SleepFn = sleep,
  ) {}

  /**
   * 固定時間待機
   */
  async throttle(context?: string): Promise<void> {
    if (this.waitTimeMs <= 0) {
      return;
    }
    logger.debug({ wait_time_ms: this.waitTimeMs, context }, "Rate limiting 待機");
    await this.sleepFn(this.waitTimeMs);
  }
}
