/**
 * Token bucket of a single client, as persisted in the store
 */
export interface IBucketState {
  /**
   * Tokens left, between 0 and maxTokens
   */
  tokens: number;

  /**
   * Refill anchor, epoch milliseconds. Only advanced when a token is consumed.
   */
  lastRefill: number;
}

export interface RefillPolicyOptions {
  maxTokens: number;
  refillRatePerHour: number;
}

export type RefillResult =
  | {
      admitted: true;
      available: number;
      next: IBucketState;
    }
  | {
      admitted: false;
      available: number;
      retryAfterMs: number;
    };
