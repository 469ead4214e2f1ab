import { Provider } from '@nestjs/common';
import { TOKEN_GATE_CONFIG, TOKEN_GATE_STORAGE_ADAPTER } from './constants';
import { ResolvedTokenGateConfig } from '../interfaces/config.interface';
import { IStateStorageAdapter } from '../interfaces/storage-adapter.interface';
import { RedisStorageAdapter } from '../adapters/redis-storage.adapter';
import { MemoryStorageAdapter } from '../adapters/memory-storage.adapter';
import {
  CUSTOM_STORAGE_ADAPTER,
  MEMORY_STORAGE_ADAPTER,
  REDIS_STORAGE_ADAPTER,
} from '../adapters/types';

/**
 * Build the storage adapter named by the configuration
 */
export function createStorageAdapter(
  config: ResolvedTokenGateConfig,
): IStateStorageAdapter {
  const { storageAdapter, storageOptions, customStorageAdapterInstance } =
    config;

  switch (storageAdapter) {
    case REDIS_STORAGE_ADAPTER:
      return new RedisStorageAdapter({ ...storageOptions.redis });
    case MEMORY_STORAGE_ADAPTER:
      return new MemoryStorageAdapter();
    case CUSTOM_STORAGE_ADAPTER:
      if (!customStorageAdapterInstance) {
        throw new Error(
          'Storage adapter type is "custom" but no customStorageAdapterInstance was provided in TokenGateConfig.',
        );
      }
      return customStorageAdapterInstance;
    default:
      throw new Error(`Unsupported storage adapter: ${String(storageAdapter)}`);
  }
}

/**
 * Creates the storage adapter provider; the adapter is initialized before use
 *
 * @returns Provider for the storage adapter
 */
export function createStorageAdapterProvider(): Provider {
  return {
    provide: TOKEN_GATE_STORAGE_ADAPTER,
    useFactory: async (
      config: ResolvedTokenGateConfig,
    ): Promise<IStateStorageAdapter> => {
      const adapter = createStorageAdapter(config);
      await adapter.initialize();
      return adapter;
    },
    inject: [TOKEN_GATE_CONFIG],
  };
}
