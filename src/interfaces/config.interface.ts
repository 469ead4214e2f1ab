import {
  InjectionToken,
  ModuleMetadata,
  OptionalFactoryDependency,
  Type,
} from '@nestjs/common';
import { Request } from 'express';
import { StorageAdapterType } from '../adapters/types';
import { IStateStorageAdapter } from './storage-adapter.interface';

export type StoreErrorPolicy = 'fail-closed' | 'fail-open';

/**
 * Redis connection options (for redis adapter)
 */
export interface RedisStorageOptions {
  host?: string;
  port?: number;
  password?: string;
  url?: string;

  /**
   * Number of connections used for transactions. Each one runs a single
   * watch/commit cycle at a time.
   * @default 1
   */
  poolSize?: number;

  /**
   * Per-command timeout in milliseconds handed to ioredis
   */
  commandTimeout?: number;
}

/**
 * Configuration for the TokenGate module
 */
export interface TokenGateConfig {
  /**
   * Bucket capacity, and the allowance of a client seen for the first time
   * @default 10
   */
  maxTokens?: number;

  /**
   * Tokens added per whole elapsed hour
   * @default 1
   */
  refillRatePerHour?: number;

  /**
   * Watch/commit cycles tried before a contended request is denied
   * @default 5
   */
  maxRetries?: number;

  /**
   * Deadline for one watch/read/commit cycle in milliseconds
   * @default 2000
   */
  attemptTimeoutMs?: number;

  /**
   * Namespace prepended to hashed client identities
   * @default 'bucket:'
   */
  keyPrefix?: string;

  /**
   * Request header carrying the client identity
   * @default 'bearer'
   */
  identityHeader?: string;

  /**
   * Resolves the client identity from a request; takes precedence over identityHeader
   */
  identityResolver?: (request: Request) => string | undefined;

  /**
   * What to do with a request when the store cannot be reached
   * @default 'fail-closed'
   */
  storeErrorPolicy?: StoreErrorPolicy;

  /**
   * Name of the storage adapter to use ('redis', 'memory', or 'custom')
   */
  storageAdapter: StorageAdapterType;

  /**
   * Storage adapter specific options
   */
  storageOptions?: {
    redis?: RedisStorageOptions;
  };

  /**
   * An instance of IStateStorageAdapter to use when storageAdapter is 'custom'
   */
  customStorageAdapterInstance?: IStateStorageAdapter;

  /**
   * Source of the current time in epoch milliseconds
   * @default Date.now
   */
  clock?: () => number;
}

/**
 * Configuration with every default applied, as injected under TOKEN_GATE_CONFIG
 */
export interface ResolvedTokenGateConfig
  extends Required<
    Omit<
      TokenGateConfig,
      'identityResolver' | 'storageOptions' | 'customStorageAdapterInstance'
    >
  > {
  identityResolver?: (request: Request) => string | undefined;
  storageOptions: {
    redis?: RedisStorageOptions;
  };
  customStorageAdapterInstance?: IStateStorageAdapter;
}

/**
 * Interface for async config factory
 */
export interface TokenGateConfigFactory {
  createTokenGateConfig(): Promise<TokenGateConfig> | TokenGateConfig;
}

/**
 * Options for async module configuration
 */
export interface TokenGateAsyncConfig extends Pick<ModuleMetadata, 'imports'> {
  /**
   * Injection token for config
   */
  useExisting?: Type<TokenGateConfigFactory>;

  /**
   * Class that implements config factory interface
   */
  useClass?: Type<TokenGateConfigFactory>;

  /**
   * Factory function for config
   */
  useFactory?: (
    ...args: any[]
  ) => Promise<TokenGateConfig> | TokenGateConfig;

  /**
   * Dependencies to inject into factory function
   */
  inject?: Array<InjectionToken | OptionalFactoryDependency>;
}
