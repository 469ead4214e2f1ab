import {
  ResolvedTokenGateConfig,
  TokenGateConfig,
} from '../interfaces/config.interface';
import {
  CUSTOM_STORAGE_ADAPTER,
  MEMORY_STORAGE_ADAPTER,
  REDIS_STORAGE_ADAPTER,
} from '../adapters/types';
import {
  DEFAULT_ATTEMPT_TIMEOUT_MS,
  DEFAULT_IDENTITY_HEADER,
  DEFAULT_KEY_PREFIX,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MAX_TOKENS,
  DEFAULT_REFILL_RATE_PER_HOUR,
  MAX_RETRIES_LIMIT,
} from './constants';

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new Error(
      `TokenGate config ${name} must be a positive integer; got ${value}`,
    );
  }
}

/**
 * Apply defaults and check a TokenGate configuration.
 * Runs once at startup; the hot path trusts the result.
 */
export function resolveConfig(config: TokenGateConfig): ResolvedTokenGateConfig {
  const resolved: ResolvedTokenGateConfig = {
    maxTokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
    refillRatePerHour: config.refillRatePerHour ?? DEFAULT_REFILL_RATE_PER_HOUR,
    maxRetries: config.maxRetries ?? DEFAULT_MAX_RETRIES,
    attemptTimeoutMs: config.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS,
    keyPrefix: config.keyPrefix ?? DEFAULT_KEY_PREFIX,
    identityHeader: config.identityHeader ?? DEFAULT_IDENTITY_HEADER,
    identityResolver: config.identityResolver,
    storeErrorPolicy: config.storeErrorPolicy ?? 'fail-closed',
    storageAdapter: config.storageAdapter,
    storageOptions: config.storageOptions ?? {},
    customStorageAdapterInstance: config.customStorageAdapterInstance,
    clock: config.clock ?? Date.now,
  };

  assertPositiveInteger('maxTokens', resolved.maxTokens);
  assertPositiveInteger('refillRatePerHour', resolved.refillRatePerHour);
  assertPositiveInteger('maxRetries', resolved.maxRetries);

  if (resolved.maxRetries > MAX_RETRIES_LIMIT) {
    throw new Error(
      `TokenGate config maxRetries must not exceed ${MAX_RETRIES_LIMIT}; got ${resolved.maxRetries}`,
    );
  }

  if (!Number.isFinite(resolved.attemptTimeoutMs) || resolved.attemptTimeoutMs <= 0) {
    throw new Error(
      `TokenGate config attemptTimeoutMs must be a positive number; got ${resolved.attemptTimeoutMs}`,
    );
  }

  if (!resolved.keyPrefix) {
    throw new Error('TokenGate config keyPrefix must not be empty');
  }

  if (!resolved.identityHeader) {
    throw new Error('TokenGate config identityHeader must not be empty');
  }

  if (
    resolved.storeErrorPolicy !== 'fail-closed' &&
    resolved.storeErrorPolicy !== 'fail-open'
  ) {
    throw new Error(
      `TokenGate config storeErrorPolicy must be 'fail-closed' or 'fail-open'; got ${String(resolved.storeErrorPolicy)}`,
    );
  }

  switch (resolved.storageAdapter) {
    case REDIS_STORAGE_ADAPTER: {
      const redis = resolved.storageOptions.redis;
      if (!redis?.url && !redis?.host) {
        throw new Error(
          'Redis storage adapter requires either url or host in storageOptions.redis',
        );
      }
      if (redis?.poolSize !== undefined) {
        assertPositiveInteger('storageOptions.redis.poolSize', redis.poolSize);
      }
      break;
    }
    case CUSTOM_STORAGE_ADAPTER:
      if (!resolved.customStorageAdapterInstance) {
        throw new Error(
          'TokenGate config must include customStorageAdapterInstance when storageAdapter is "custom"',
        );
      }
      break;
    case MEMORY_STORAGE_ADAPTER:
      break;
    default:
      throw new Error('TokenGate config must include a storageAdapter');
  }

  return resolved;
}
