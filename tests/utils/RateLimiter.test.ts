/**
 * RateLimiter テスト
 */

import { describe, it, expect, jest } from "@jest/globals";
import { RateLimiter, type SleepFn } from "@/utils/RateLimiter";

describe("RateLimiter", () => {
  it("指定ミリ秒だけ待機すること", async () => {
    const sleep = jest.fn<SleepFn>().mockResolvedValue(undefined);

    await new RateLimiter(1500, sleep).throttle("page 1");

    expect(sleep).toHaveBeenCalledWith(1500);
  });

  it("0 以下なら待機しないこと", async () => {
    const sleep = jest.fn<SleepFn>().mockResolvedValue(undefined);

    await new RateLimiter(0, sleep).throttle();

    expect(sleep).not.toHaveBeenCalled();
  });
});
