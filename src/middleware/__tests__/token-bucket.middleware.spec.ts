import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { Request, Response } from 'express';
import { TokenBucketMiddleware } from '../token-bucket.middleware';
import { AdmissionService } from '../../services/admission.service';
import { BucketTransactorService } from '../../services/bucket-transactor.service';
import { MemoryStorageAdapter } from '../../adapters/memory-storage.adapter';
import { TokenGateConfig } from '../../interfaces/config.interface';
import { resolveConfig } from '../../utils/config.validation';
import { StoreError } from '../../utils/errors';
import {
  TOKEN_GATE_CONFIG,
  TOKEN_GATE_STORAGE_ADAPTER,
} from '../../utils/constants';

function createRequest(headers: Record<string, string> = {}) {
  return {
    headers,
    header: jest.fn((name: string) => headers[name.toLowerCase()]),
  } as unknown as Request;
}

function createResponse() {
  const res = {
    status: jest.fn(),
    setHeader: jest.fn(),
    end: jest.fn(),
  };
  res.status.mockReturnValue(res);
  return res;
}

describe('TokenBucketMiddleware', () => {
  let middleware: TokenBucketMiddleware;
  let admissionService: AdmissionService;
  let errorSpy: jest.SpyInstance;

  async function setup(overrides: Partial<TokenGateConfig> = {}) {
    const config = resolveConfig({
      storageAdapter: 'memory',
      maxTokens: 2,
      clock: () => Date.UTC(2026, 6, 4, 10, 0, 0),
      ...overrides,
    });

    const module = await Test.createTestingModule({
      providers: [
        TokenBucketMiddleware,
        AdmissionService,
        BucketTransactorService,
        { provide: TOKEN_GATE_CONFIG, useValue: config },
        { provide: TOKEN_GATE_STORAGE_ADAPTER, useValue: new MemoryStorageAdapter() },
      ],
    }).compile();

    middleware = module.get<TokenBucketMiddleware>(TokenBucketMiddleware);
    admissionService = module.get<AdmissionService>(AdmissionService);
  }

  beforeEach(async () => {
    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation();
    await setup();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should forward an admitted request', async () => {
    const res = createResponse();
    const next = jest.fn();

    await middleware.use(
      createRequest({ bearer: 'client-1' }),
      res as unknown as Response,
      next,
    );

    expect(next).toHaveBeenCalledWith();
    expect(res.status).not.toHaveBeenCalled();
  });

  it('should answer 401 with an empty body without identity', async () => {
    const res = createResponse();
    const next = jest.fn();
    const admitSpy = jest.spyOn(admissionService, 'admit');

    await middleware.use(createRequest(), res as unknown as Response, next);

    expect(admitSpy).toHaveBeenCalledWith(undefined);
    expect(res.status).toHaveBeenCalledWith(401);
    expect(res.end).toHaveBeenCalledWith();
    expect(next).not.toHaveBeenCalled();
  });

  it('should answer 429 with Retry-After once the bucket is empty', async () => {
    const next = jest.fn();
    for (let i = 0; i < 2; i++) {
      await middleware.use(
        createRequest({ bearer: 'client-1' }),
        createResponse() as unknown as Response,
        next,
      );
    }
    next.mockClear();
    const res = createResponse();

    await middleware.use(
      createRequest({ bearer: 'client-1' }),
      res as unknown as Response,
      next,
    );

    expect(res.setHeader).toHaveBeenCalledWith('Retry-After', '3600');
    expect(res.status).toHaveBeenCalledWith(429);
    expect(res.end).toHaveBeenCalledWith();
    expect(next).not.toHaveBeenCalled();
  });

  it('should answer 429 without Retry-After under contention', async () => {
    jest
      .spyOn(admissionService, 'admit')
      .mockResolvedValue({ status: 'denied', reason: 'contention' });
    const res = createResponse();

    await middleware.use(
      createRequest({ bearer: 'client-1' }),
      res as unknown as Response,
      jest.fn(),
    );

    expect(res.setHeader).not.toHaveBeenCalled();
    expect(res.status).toHaveBeenCalledWith(429);
  });

  it('should answer 503 when the store fails', async () => {
    jest.spyOn(admissionService, 'admit').mockResolvedValue({
      status: 'store-error',
      error: new StoreError('connection refused'),
    });
    const res = createResponse();
    const next = jest.fn();

    await middleware.use(
      createRequest({ bearer: 'client-1' }),
      res as unknown as Response,
      next,
    );

    expect(res.status).toHaveBeenCalledWith(503);
    expect(res.end).toHaveBeenCalledWith();
    expect(next).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should pass unexpected failures to the error handler', async () => {
    const failure = new Error('unexpected');
    jest.spyOn(admissionService, 'admit').mockRejectedValue(failure);
    const next = jest.fn();

    await middleware.use(
      createRequest({ bearer: 'client-1' }),
      createResponse() as unknown as Response,
      next,
    );

    expect(next).toHaveBeenCalledWith(failure);
  });

  it('should read the identity from the configured header', async () => {
    await setup({ identityHeader: 'x-api-key' });
    const admitSpy = jest.spyOn(admissionService, 'admit');

    await middleware.use(
      createRequest({ 'x-api-key': 'key-1', bearer: 'ignored' }),
      createResponse() as unknown as Response,
      jest.fn(),
    );

    expect(admitSpy).toHaveBeenCalledWith('key-1');
  });

  it('should prefer a configured identity resolver', async () => {
    await setup({
      identityResolver: (req) => {
        const user = req.headers['x-user'];
        return typeof user === 'string' ? `user:${user}` : undefined;
      },
    });
    const admitSpy = jest.spyOn(admissionService, 'admit');

    await middleware.use(
      createRequest({ 'x-user': '42' }),
      createResponse() as unknown as Response,
      jest.fn(),
    );

    expect(admitSpy).toHaveBeenCalledWith('user:42');
  });
});
