import { Inject, Injectable, Logger } from '@nestjs/common';
import { ResolvedTokenGateConfig } from '../interfaces/config.interface';
import {
  AdmissionDecision,
  AdmissionVerdict,
  BucketInspection,
} from '../interfaces/admission.interface';
import { BucketTransactorService } from './bucket-transactor.service';
import { deriveBucketKey } from '../utils/bucket-key';
import { refillBucket } from '../utils/refill-policy';
import { TOKEN_GATE_CONFIG } from '../utils/constants';

@Injectable()
export class AdmissionService {
  private readonly logger = new Logger(AdmissionService.name);

  constructor(
    @Inject(TOKEN_GATE_CONFIG)
    private readonly config: ResolvedTokenGateConfig,
    private readonly transactor: BucketTransactorService,
  ) {}

  /**
   * Decide whether a client may proceed, consuming one of its tokens if so.
   * A client without identity is refused before the store is touched.
   */
  async admit(identity: string | null | undefined): Promise<AdmissionVerdict> {
    if (!identity) {
      return { status: 'unauthenticated' };
    }

    const key = deriveBucketKey(identity, this.config.keyPrefix);
    const outcome = await this.transactor.attempt(key);

    switch (outcome.kind) {
      case 'admitted':
        return { status: 'admitted', state: outcome.state };
      case 'denied':
        return {
          status: 'denied',
          reason: outcome.reason,
          retryAfterMs: outcome.retryAfterMs,
        };
      case 'store-error':
        if (this.config.storeErrorPolicy === 'fail-open') {
          this.logger.warn(
            `Admitting ${key} without rate limiting: ${outcome.error.message}`,
          );
          return { status: 'admitted', state: null };
        }
        return { status: 'store-error', error: outcome.error };
    }
  }

  /**
   * Gate a downstream call. downstream only runs when the client is admitted,
   * and its result or error is passed through untouched.
   */
  async handle<T>(
    identity: string | null | undefined,
    downstream: () => T | Promise<T>,
  ): Promise<AdmissionDecision<T>> {
    const verdict = await this.admit(identity);
    if (verdict.status !== 'admitted') {
      return verdict;
    }

    const response = await downstream();
    return { ...verdict, response };
  }

  /**
   * Report a client's bucket as it stands now, without consuming or writing
   */
  async inspect(identity: string): Promise<BucketInspection> {
    const key = deriveBucketKey(identity, this.config.keyPrefix);
    const state = await this.transactor.read(key);
    const result = refillBucket(state, this.config.clock(), this.config);

    return {
      key,
      state,
      available: result.available,
      retryAfterMs: result.admitted ? 0 : result.retryAfterMs,
    };
  }
}
