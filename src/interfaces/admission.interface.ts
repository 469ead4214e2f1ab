import { IBucketState } from './bucket-state.interface';
import { StoreError } from '../utils/errors';

export type DenialReason = 'exhausted' | 'contention';

/**
 * Result of one optimistic admission attempt on a bucket key
 */
export type TransactionOutcome =
  | { kind: 'admitted'; state: IBucketState; attempts: number }
  | {
      kind: 'denied';
      reason: DenialReason;
      attempts: number;
      retryAfterMs?: number;
    }
  | { kind: 'store-error'; error: StoreError; attempts: number };

/**
 * Decision taken for a request at the gate
 */
export type AdmissionVerdict =
  | {
      status: 'admitted';
      /**
       * Bucket after consumption; null when admitted by the fail-open policy
       */
      state: IBucketState | null;
    }
  | { status: 'unauthenticated' }
  | { status: 'denied'; reason: DenialReason; retryAfterMs?: number }
  | { status: 'store-error'; error: StoreError };

/**
 * Verdict of a gated call; carries the downstream result when it ran
 */
export type AdmissionDecision<T> =
  | (Extract<AdmissionVerdict, { status: 'admitted' }> & { response: T })
  | Exclude<AdmissionVerdict, { status: 'admitted' }>;

/**
 * Read-only view of a client's bucket
 */
export interface BucketInspection {
  key: string;
  state: IBucketState | null;
  available: number;
  retryAfterMs: number;
}
