import {
  HttpStatus,
  Inject,
  Injectable,
  Logger,
  NestMiddleware,
} from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { AdmissionService } from '../services/admission.service';
import { ResolvedTokenGateConfig } from '../interfaces/config.interface';
import { AdmissionVerdict } from '../interfaces/admission.interface';
import { TOKEN_GATE_CONFIG } from '../utils/constants';

/**
 * Rate limits every request it is applied to, one token per request.
 *
 * Rejections are answered here with an empty body: 401 without identity,
 * 429 when the bucket is empty, 503 when the store fails under fail-closed.
 *
 * @example
 * ```typescript
 * export class AppModule implements NestModule {
 *   configure(consumer: MiddlewareConsumer) {
 *     consumer.apply(TokenBucketMiddleware).forRoutes('*');
 *   }
 * }
 * ```
 */
@Injectable()
export class TokenBucketMiddleware implements NestMiddleware {
  private readonly logger = new Logger(TokenBucketMiddleware.name);

  constructor(
    @Inject(TOKEN_GATE_CONFIG)
    private readonly config: ResolvedTokenGateConfig,
    private readonly admissionService: AdmissionService,
  ) {}

  async use(req: Request, res: Response, next: NextFunction): Promise<void> {
    let verdict: AdmissionVerdict;
    try {
      verdict = await this.admissionService.admit(this.resolveIdentity(req));
    } catch (error) {
      next(error);
      return;
    }

    if (verdict.status === 'admitted') {
      next();
      return;
    }

    this.reject(res, verdict);
  }

  private resolveIdentity(req: Request): string | undefined {
    if (this.config.identityResolver) {
      return this.config.identityResolver(req);
    }
    return req.header(this.config.identityHeader);
  }

  private reject(
    res: Response,
    verdict: Exclude<AdmissionVerdict, { status: 'admitted' }>,
  ): void {
    switch (verdict.status) {
      case 'unauthenticated':
        res.status(HttpStatus.UNAUTHORIZED).end();
        return;
      case 'denied':
        if (verdict.retryAfterMs !== undefined) {
          res.setHeader(
            'Retry-After',
            String(Math.ceil(verdict.retryAfterMs / 1000)),
          );
        }
        res.status(HttpStatus.TOO_MANY_REQUESTS).end();
        return;
      case 'store-error':
        this.logger.debug(
          `Rejecting request, bucket store unavailable: ${verdict.error.message}`,
        );
        res.status(HttpStatus.SERVICE_UNAVAILABLE).end();
        return;
    }
  }
}
