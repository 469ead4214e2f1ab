import { Injectable } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { TokenGateModule } from '../token-gate.module';
import { AdmissionService } from '../services/admission.service';
import { TokenBucketMiddleware } from '../middleware/token-bucket.middleware';
import { MemoryStorageAdapter } from '../adapters/memory-storage.adapter';
import {
  ResolvedTokenGateConfig,
  TokenGateConfig,
  TokenGateConfigFactory,
} from '../interfaces/config.interface';
import { IStateStorageAdapter } from '../interfaces/storage-adapter.interface';
import {
  TOKEN_GATE_CONFIG,
  TOKEN_GATE_STORAGE_ADAPTER,
} from '../utils/constants';

@Injectable()
class StaticConfigFactory implements TokenGateConfigFactory {
  createTokenGateConfig(): TokenGateConfig {
    return { storageAdapter: 'memory', refillRatePerHour: 4 };
  }
}

describe('TokenGateModule', () => {
  describe('forRoot', () => {
    it('should provide the gate with defaults applied', async () => {
      const module = await Test.createTestingModule({
        imports: [TokenGateModule.forRoot({ storageAdapter: 'memory' })],
      }).compile();

      const config = module.get<ResolvedTokenGateConfig>(TOKEN_GATE_CONFIG);
      expect(config).toMatchObject({
        maxTokens: 10,
        refillRatePerHour: 1,
        maxRetries: 5,
        attemptTimeoutMs: 2000,
        keyPrefix: 'bucket:',
        identityHeader: 'bearer',
        storeErrorPolicy: 'fail-closed',
      });
      expect(module.get(TOKEN_GATE_STORAGE_ADAPTER)).toBeInstanceOf(
        MemoryStorageAdapter,
      );
      expect(module.get(AdmissionService)).toBeInstanceOf(AdmissionService);
      expect(module.get(TokenBucketMiddleware)).toBeInstanceOf(
        TokenBucketMiddleware,
      );
    });

    it('should initialize a custom adapter', async () => {
      const custom: IStateStorageAdapter = {
        initialize: jest.fn().mockResolvedValue(undefined),
        runExclusive: (work) => work({
          watch: jest.fn(),
          get: jest.fn(),
          unwatch: jest.fn(),
          commit: jest.fn(),
        }),
        get: jest.fn(),
        close: jest.fn(),
      };

      const module = await Test.createTestingModule({
        imports: [
          TokenGateModule.forRoot({
            storageAdapter: 'custom',
            customStorageAdapterInstance: custom,
          }),
        ],
      }).compile();

      expect(module.get(TOKEN_GATE_STORAGE_ADAPTER)).toBe(custom);
      expect(custom.initialize).toHaveBeenCalledTimes(1);
    });

    it.each<[string, TokenGateConfig, string]>([
      [
        'a zero maxTokens',
        { storageAdapter: 'memory', maxTokens: 0 },
        'TokenGate config maxTokens must be a positive integer; got 0',
      ],
      [
        'a fractional refill rate',
        { storageAdapter: 'memory', refillRatePerHour: 0.5 },
        'TokenGate config refillRatePerHour must be a positive integer; got 0.5',
      ],
      [
        'too many retries',
        { storageAdapter: 'memory', maxRetries: 21 },
        'TokenGate config maxRetries must not exceed 20; got 21',
      ],
      [
        'a negative timeout',
        { storageAdapter: 'memory', attemptTimeoutMs: -1 },
        'TokenGate config attemptTimeoutMs must be a positive number; got -1',
      ],
      [
        'redis without a target',
        { storageAdapter: 'redis', storageOptions: { redis: {} } },
        'Redis storage adapter requires either url or host in storageOptions.redis',
      ],
      [
        'custom without an instance',
        { storageAdapter: 'custom' },
        'TokenGate config must include customStorageAdapterInstance when storageAdapter is "custom"',
      ],
    ])('should reject %s', (_, config, message) => {
      expect(() => TokenGateModule.forRoot(config)).toThrow(message);
    });
  });

  describe('forRootAsync', () => {
    it('should build the config from ConfigService', async () => {
      const module = await Test.createTestingModule({
        imports: [
          ConfigModule.forRoot({
            ignoreEnvFile: true,
            load: [() => ({ TOKEN_GATE_MAX_TOKENS: 25 })],
          }),
          TokenGateModule.forRootAsync({
            imports: [ConfigModule],
            inject: [ConfigService],
            useFactory: (configService: ConfigService) => ({
              maxTokens: configService.get<number>('TOKEN_GATE_MAX_TOKENS'),
              storageAdapter: 'memory',
            }),
          }),
        ],
      }).compile();

      const config = module.get<ResolvedTokenGateConfig>(TOKEN_GATE_CONFIG);
      expect(config.maxTokens).toBe(25);
      await expect(
        module.get(AdmissionService).admit('client-1'),
      ).resolves.toMatchObject({ state: { tokens: 24 } });
    });

    it('should use a config factory class', async () => {
      const module = await Test.createTestingModule({
        imports: [TokenGateModule.forRootAsync({ useClass: StaticConfigFactory })],
      }).compile();

      expect(
        module.get<ResolvedTokenGateConfig>(TOKEN_GATE_CONFIG).refillRatePerHour,
      ).toBe(4);
    });

    it('should validate the produced config', async () => {
      await expect(
        Test.createTestingModule({
          imports: [
            TokenGateModule.forRootAsync({
              useFactory: () => ({ storageAdapter: 'memory', maxTokens: -5 }),
            }),
          ],
        }).compile(),
      ).rejects.toThrow(
        'TokenGate config maxTokens must be a positive integer; got -5',
      );
    });

    it('should require a way to build the config', () => {
      expect(() => TokenGateModule.forRootAsync({})).toThrow(
        'Invalid TokenGateAsyncConfig. Must provide useFactory, useClass, or useExisting.',
      );
    });
  });
});
