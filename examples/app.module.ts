/**
 * Example of how to protect a NestJS application with TokenGate
 */
import {
  Controller,
  Get,
  Headers,
  MiddlewareConsumer,
  Module,
  NestModule,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  AdmissionService,
  BucketInspection,
  TokenBucketMiddleware,
  TokenGateModule,
} from '../src';

@Controller()
export class HelloController {
  constructor(private readonly admissionService: AdmissionService) {}

  @Get()
  hello(): string {
    return 'Hello, World!';
  }

  /**
   * Remaining allowance of the caller; not rate limited itself
   */
  @Get('limits')
  limits(
    @Headers('bearer') identity: string | undefined,
  ): Promise<BucketInspection> {
    if (!identity) {
      throw new UnauthorizedException();
    }
    return this.admissionService.inspect(identity);
  }
}

@Module({
  imports: [
    ConfigModule.forRoot(),
    TokenGateModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        maxTokens: Number(configService.get<string>('TOKEN_GATE_MAX_TOKENS', '10')),
        refillRatePerHour: Number(
          configService.get<string>('TOKEN_GATE_REFILL_RATE_PER_HOUR', '1'),
        ),
        maxRetries: Number(
          configService.get<string>('TOKEN_GATE_MAX_RETRIES', '5'),
        ),
        storageAdapter: 'redis',
        storageOptions: {
          redis: {
            url: configService.get<string>(
              'REDIS_HOST',
              'redis://localhost:6379',
            ),
            commandTimeout: 1000,
          },
        },
      }),
    }),
  ],
  controllers: [HelloController],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer
      .apply(TokenBucketMiddleware)
      .exclude('limits')
      .forRoutes(HelloController);
  }
}
