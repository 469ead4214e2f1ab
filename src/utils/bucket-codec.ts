import { IBucketState } from '../interfaces/bucket-state.interface';
import { CorruptStateError } from './errors';

/**
 * Stored layout of a bucket. `last_updated` is an ISO-8601 UTC timestamp.
 */
interface StoredBucket {
  tokens: number;
  last_updated: string;
}

/**
 * RFC 3339 date-time; the fraction may carry up to nanosecond precision
 */
const TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:\d{2})$/;

function parseTimestamp(value: string): number {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (match === null) {
    return NaN;
  }

  const [, dateTime, fraction = '', offset] = match;
  const millis = fraction.slice(0, 3).padEnd(3, '0');
  return Date.parse(`${dateTime}.${millis}${offset}`);
}

export function encodeBucketState(state: IBucketState): string {
  const stored: StoredBucket = {
    tokens: state.tokens,
    last_updated: new Date(state.lastRefill).toISOString(),
  };
  return JSON.stringify(stored);
}

/**
 * Decode a stored bucket.
 * @throws CorruptStateError when the value was not written by encodeBucketState
 */
export function decodeBucketState(raw: string): IBucketState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new CorruptStateError('not JSON', raw.length);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new CorruptStateError('not an object', raw.length);
  }

  const tokens = 'tokens' in parsed ? parsed.tokens : undefined;
  const lastUpdated = 'last_updated' in parsed ? parsed.last_updated : undefined;

  if (typeof tokens !== 'number' || !Number.isSafeInteger(tokens) || tokens < 0) {
    throw new CorruptStateError('invalid tokens', raw.length);
  }

  if (typeof lastUpdated !== 'string') {
    throw new CorruptStateError('missing last_updated', raw.length);
  }

  const lastRefill = parseTimestamp(lastUpdated);
  if (Number.isNaN(lastRefill)) {
    throw new CorruptStateError('invalid last_updated', raw.length);
  }

  return { tokens, lastRefill };
}
