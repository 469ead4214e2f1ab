import { Inject, Injectable, Logger } from '@nestjs/common';
import { IBucketState } from '../interfaces/bucket-state.interface';
import { ResolvedTokenGateConfig } from '../interfaces/config.interface';
import {
  IStateStorageAdapter,
  IStateStoreSession,
} from '../interfaces/storage-adapter.interface';
import { TransactionOutcome } from '../interfaces/admission.interface';
import { decodeBucketState, encodeBucketState } from '../utils/bucket-codec';
import { refillBucket } from '../utils/refill-policy';
import {
  CorruptStateError,
  describeError,
  StoreError,
  StoreTimeoutError,
} from '../utils/errors';
import { TOKEN_GATE_CONFIG, TOKEN_GATE_STORAGE_ADAPTER } from '../utils/constants';

/**
 * How a single watch/read/commit cycle ended
 */
type CycleResult =
  | { phase: 'committed'; state: IBucketState }
  | { phase: 'denied'; retryAfterMs: number }
  | { phase: 'conflict' };

/**
 * Once committing is set the deadline no longer applies: the write is in
 * flight and its result is awaited, bounded by the store's own command timeout.
 */
interface CycleDeadline {
  expired: boolean;
  committing: boolean;
}

/**
 * Consumes tokens with optimistic transactions on the store.
 *
 * Each cycle watches the bucket key, reads and refills it, then either releases
 * the watch (no token) or commits the consumed bucket. A commit rejected because
 * another process wrote the key in between starts a new cycle, up to maxRetries.
 */
@Injectable()
export class BucketTransactorService {
  private readonly logger = new Logger(BucketTransactorService.name);

  constructor(
    @Inject(TOKEN_GATE_CONFIG)
    private readonly config: ResolvedTokenGateConfig,
    @Inject(TOKEN_GATE_STORAGE_ADAPTER)
    private readonly storageAdapter: IStateStorageAdapter,
  ) {}

  /**
   * Try to take one token from the bucket stored under key
   */
  async attempt(key: string): Promise<TransactionOutcome> {
    const { maxRetries } = this.config;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      let cycle: CycleResult;
      try {
        cycle = await this.runCycleWithDeadline(key);
      } catch (error) {
        const storeError =
          error instanceof StoreError
            ? error
            : new StoreError(
                `Store failure on ${key}: ${describeError(error)}`,
                { cause: error },
              );
        this.logger.error(storeError.message, storeError.stack);
        return { kind: 'store-error', error: storeError, attempts: attempt };
      }

      switch (cycle.phase) {
        case 'committed':
          this.logger.debug(
            `Consumed 1 token for key ${key}, ${cycle.state.tokens} remaining`,
          );
          return { kind: 'admitted', state: cycle.state, attempts: attempt };
        case 'denied':
          this.logger.debug(`Rate limit exceeded for key ${key}`);
          return {
            kind: 'denied',
            reason: 'exhausted',
            retryAfterMs: cycle.retryAfterMs,
            attempts: attempt,
          };
        case 'conflict':
          this.logger.debug(
            `Concurrent write on ${key}, retrying (${attempt}/${maxRetries})`,
          );
          break;
      }
    }

    this.logger.warn(
      `Gave up on key ${key} after ${maxRetries} conflicting attempts`,
    );
    return { kind: 'denied', reason: 'contention', attempts: maxRetries };
  }

  /**
   * Read a bucket without watching it, treating a corrupt record as absent
   */
  async read(key: string): Promise<IBucketState | null> {
    const raw = await this.storageAdapter.get(key);
    return this.decodeOrReset(key, raw);
  }

  private async runCycleWithDeadline(key: string): Promise<CycleResult> {
    const { attemptTimeoutMs } = this.config;
    const deadline: CycleDeadline = { expired: false, committing: false };
    let timer: NodeJS.Timeout | undefined;

    const cycle = this.storageAdapter.runExclusive((session) =>
      this.runCycle(session, key, deadline),
    );
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        if (deadline.committing) {
          return;
        }
        deadline.expired = true;
        reject(new StoreTimeoutError(key, attemptTimeoutMs));
      }, attemptTimeoutMs);
    });

    // A cycle that loses the race settles later; its failure is only reported
    cycle.catch((error: unknown) => {
      if (deadline.expired) {
        this.logger.warn(
          `Late failure of timed out cycle on ${key}: ${describeError(error)}`,
        );
      }
    });

    try {
      return await Promise.race([cycle, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async runCycle(
    session: IStateStoreSession,
    key: string,
    deadline: CycleDeadline,
  ): Promise<CycleResult> {
    await session.watch(key);
    const previous = this.decodeOrReset(key, await session.get(key));

    const result = refillBucket(previous, this.config.clock(), this.config);

    if (!result.admitted) {
      await session.unwatch();
      return { phase: 'denied', retryAfterMs: result.retryAfterMs };
    }

    if (deadline.expired) {
      await session.unwatch();
      throw new StoreTimeoutError(key, this.config.attemptTimeoutMs);
    }

    deadline.committing = true;
    const committed = await session.commit(key, encodeBucketState(result.next));
    return committed
      ? { phase: 'committed', state: result.next }
      : { phase: 'conflict' };
  }

  private decodeOrReset(key: string, raw: string | null): IBucketState | null {
    if (raw === null) {
      return null;
    }

    try {
      return decodeBucketState(raw);
    } catch (error) {
      if (error instanceof CorruptStateError) {
        this.logger.warn(
          `Corrupt bucket under ${key} treated as a fresh bucket: ${error.reason}`,
        );
        return null;
      }
      throw error;
    }
  }
}
