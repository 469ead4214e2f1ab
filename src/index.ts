// Module
export { TokenGateModule } from './token-gate.module';

// Services
export { AdmissionService } from './services/admission.service';
export { BucketTransactorService } from './services/bucket-transactor.service';

// Middleware
export { TokenBucketMiddleware } from './middleware/token-bucket.middleware';

// Interfaces
export {
  TokenGateConfig,
  TokenGateAsyncConfig,
  TokenGateConfigFactory,
  ResolvedTokenGateConfig,
  RedisStorageOptions,
  StoreErrorPolicy,
} from './interfaces/config.interface';
export {
  IStateStorageAdapter,
  IStateStoreSession,
} from './interfaces/storage-adapter.interface';
export {
  IBucketState,
  RefillPolicyOptions,
  RefillResult,
} from './interfaces/bucket-state.interface';
export {
  AdmissionDecision,
  AdmissionVerdict,
  BucketInspection,
  DenialReason,
  TransactionOutcome,
} from './interfaces/admission.interface';

// Building blocks
export { deriveBucketKey } from './utils/bucket-key';
export { decodeBucketState, encodeBucketState } from './utils/bucket-codec';
export { refillBucket } from './utils/refill-policy';
export {
  CorruptStateError,
  StoreError,
  StoreTimeoutError,
  TokenGateError,
} from './utils/errors';
export { TOKEN_GATE_CONFIG, TOKEN_GATE_STORAGE_ADAPTER } from './utils/constants';

// Storage Adapters (for extending)
export { RedisStorageAdapter } from './adapters/redis-storage.adapter';
export { MemoryStorageAdapter } from './adapters/memory-storage.adapter';
