import { createHash } from 'node:crypto';
import { DEFAULT_KEY_PREFIX } from './constants';

/**
 * Map a client identity to the store key holding its bucket.
 * The identity is hashed so the store never holds raw client identifiers.
 */
export function deriveBucketKey(
  identity: string,
  prefix: string = DEFAULT_KEY_PREFIX,
): string {
  const digest = createHash('sha256').update(identity, 'utf8').digest('hex');
  return `${prefix}${digest}`;
}
