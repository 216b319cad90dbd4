export type RateLimit = {
  windowMs: number;
  maxCalls: number;
};

export interface RateLimiter {
  /**
   * Records a call for `key` and returns 0 while fewer than `maxCalls` fall inside
   * the window; otherwise returns the whole seconds until a call is allowed again.
   */
  attempt(key: string, limit: RateLimit, now: Date): Promise<number>;
}
