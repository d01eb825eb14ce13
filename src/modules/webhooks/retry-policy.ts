export const BASE_RETRY_DELAY_MINUTES = 5;
export const MAX_RETRY_DELAY_MINUTES = 24 * 60;

/**
 * 指数退避：5, 10, 20, 40 ... 分钟，封顶 24 小时
 * retryCount 为本次失败之前已失败的次数
 */
export function retryDelayMinutes(retryCount: number): number {
  const exponent = Math.max(0, Math.floor(retryCount));
  return Math.min(BASE_RETRY_DELAY_MINUTES * 2 ** exponent, MAX_RETRY_DELAY_MINUTES);
}

export function computeNextRetryAt(retryCount: number, now: Date = new Date()): Date {
  return new Date(now.getTime() + retryDelayMinutes(retryCount) * 60_000);
}
