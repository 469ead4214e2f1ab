import {
  IBucketState,
  RefillPolicyOptions,
  RefillResult,
} from '../interfaces/bucket-state.interface';
import { HOUR_MS } from './constants';

/**
 * Refill a bucket for the hours elapsed since its anchor and try to take one token.
 *
 * Refill is counted in whole hours. A missing bucket starts full. When no token is
 * available nothing is returned to persist: the anchor must stay where it is.
 */
export function refillBucket(
  previous: IBucketState | null,
  now: number,
  policy: RefillPolicyOptions,
): RefillResult {
  const { maxTokens, refillRatePerHour } = policy;
  const bucket = previous ?? { tokens: maxTokens, lastRefill: now };

  // clock skew: never refill negatively
  const elapsedHours = Math.max(
    0,
    Math.floor((now - bucket.lastRefill) / HOUR_MS),
  );
  const available = Math.min(
    maxTokens,
    bucket.tokens + elapsedHours * refillRatePerHour,
  );

  if (available < 1) {
    const hoursNeeded = Math.ceil((1 - bucket.tokens) / refillRatePerHour);
    const readyAt = bucket.lastRefill + hoursNeeded * HOUR_MS;
    return {
      admitted: false,
      available,
      retryAfterMs: Math.max(0, readyAt - now),
    };
  }

  return {
    admitted: true,
    available,
    next: {
      tokens: Math.max(0, available - 1),
      lastRefill: Math.max(now, bucket.lastRefill),
    },
  };
}
