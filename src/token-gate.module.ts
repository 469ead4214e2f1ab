import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import {
  ResolvedTokenGateConfig,
  TokenGateAsyncConfig,
  TokenGateConfig,
  TokenGateConfigFactory,
} from './interfaces/config.interface';
import { TOKEN_GATE_CONFIG, TOKEN_GATE_STORAGE_ADAPTER } from './utils/constants';
import { createStorageAdapterProvider } from './utils/storage-adapter.factory';
import { resolveConfig } from './utils/config.validation';
import { BucketTransactorService } from './services/bucket-transactor.service';
import { AdmissionService } from './services/admission.service';
import { TokenBucketMiddleware } from './middleware/token-bucket.middleware';

const SERVICES = [
  BucketTransactorService,
  AdmissionService,
  TokenBucketMiddleware,
];

/**
 * Main module for TokenGate. Use forRoot or forRootAsync to configure and register,
 * then apply TokenBucketMiddleware to the routes to protect.
 */
@Global()
@Module({})
export class TokenGateModule {
  /**
   * Register the TokenGate module with static configuration
   *
   * @param config Configuration for the TokenGate module
   * @returns Dynamic module
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     TokenGateModule.forRoot({
   *       maxTokens: 10,
   *       refillRatePerHour: 1,
   *       storageAdapter: 'redis',
   *       storageOptions: {
   *         redis: { url: 'redis://localhost:6379' },
   *       },
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRoot(config: TokenGateConfig): DynamicModule {
    const configProvider: Provider = {
      provide: TOKEN_GATE_CONFIG,
      useValue: resolveConfig(config),
    };

    return {
      module: TokenGateModule,
      global: true,
      providers: [configProvider, createStorageAdapterProvider(), ...SERVICES],
      exports: [TOKEN_GATE_CONFIG, TOKEN_GATE_STORAGE_ADAPTER, ...SERVICES],
    };
  }

  /**
   * Register the TokenGate module with async configuration
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     ConfigModule.forRoot(),
   *     TokenGateModule.forRootAsync({
   *       imports: [ConfigModule],
   *       inject: [ConfigService],
   *       useFactory: (configService: ConfigService) => ({
   *         maxTokens: configService.get<number>('TOKEN_GATE_MAX_TOKENS', 10),
   *         storageAdapter: 'redis',
   *         storageOptions: {
   *           redis: { url: configService.get<string>('REDIS_HOST') },
   *         },
   *       }),
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRootAsync(asyncConfig: TokenGateAsyncConfig): DynamicModule {
    const providers: Provider[] = [
      TokenGateModule.createAsyncConfigProvider(asyncConfig),
      createStorageAdapterProvider(),
      ...SERVICES,
    ];

    if (asyncConfig.useClass) {
      providers.push({
        provide: asyncConfig.useClass,
        useClass: asyncConfig.useClass,
      });
    }

    return {
      module: TokenGateModule,
      global: true,
      imports: asyncConfig.imports || [],
      providers,
      exports: [TOKEN_GATE_CONFIG, TOKEN_GATE_STORAGE_ADAPTER, ...SERVICES],
    };
  }

  /**
   * Create async config provider
   * @internal
   */
  private static createAsyncConfigProvider(
    options: TokenGateAsyncConfig,
  ): Provider {
    const { useFactory } = options;
    if (useFactory) {
      return {
        provide: TOKEN_GATE_CONFIG,
        useFactory: async (...args: unknown[]): Promise<ResolvedTokenGateConfig> =>
          resolveConfig(await useFactory(...args)),
        inject: options.inject || [],
      };
    }

    const factoryClass = options.useClass || options.useExisting;
    if (factoryClass) {
      return {
        provide: TOKEN_GATE_CONFIG,
        useFactory: async (
          configFactory: TokenGateConfigFactory,
        ): Promise<ResolvedTokenGateConfig> =>
          resolveConfig(await configFactory.createTokenGateConfig()),
        inject: [factoryClass],
      };
    }

    throw new Error(
      'Invalid TokenGateAsyncConfig. Must provide useFactory, useClass, or useExisting.',
    );
  }
}
