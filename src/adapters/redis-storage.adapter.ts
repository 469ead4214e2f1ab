import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Redis } from 'ioredis';
import AsyncLock from 'async-lock';
import {
  IStateStorageAdapter,
  IStateStoreSession,
} from '../interfaces/storage-adapter.interface';
import { RedisStorageOptions } from '../interfaces/config.interface';
import { describeError, StoreError } from '../utils/errors';

/**
 * Session bound to one Redis connection.
 * WATCH state in Redis is per connection, so the adapter hands a connection
 * to one session at a time.
 */
class RedisStoreSession implements IStateStoreSession {
  watching = false;

  constructor(private readonly connection: Redis) {}

  async watch(key: string): Promise<void> {
    await this.connection.watch(key);
    this.watching = true;
  }

  async get(key: string): Promise<string | null> {
    return this.connection.get(key);
  }

  async unwatch(): Promise<void> {
    await this.connection.unwatch();
    this.watching = false;
  }

  async commit(key: string, value: string): Promise<boolean> {
    // EXEC clears the watch whatever its outcome
    this.watching = false;
    const results = await this.connection.multi().set(key, value).exec();

    if (results === null) {
      return false;
    }

    for (const [error] of results) {
      if (error) {
        throw new StoreError(`SET ${key} failed inside transaction`, {
          cause: error,
        });
      }
    }
    return true;
  }
}

/**
 * Redis storage adapter for TokenGate
 */
@Injectable()
export class RedisStorageAdapter implements IStateStorageAdapter, OnModuleDestroy {
  private readonly logger = new Logger(RedisStorageAdapter.name);
  private readonly client: Redis;
  private readonly ownsClient: boolean;
  private readonly poolSize: number;
  private readonly lock = new AsyncLock({ maxPending: Infinity });
  private connections: Redis[] = [];
  private nextConnection = 0;

  constructor(options: RedisStorageOptions & { client?: Redis }) {
    this.poolSize = Math.max(1, options.poolSize ?? 1);

    if (options.client) {
      this.client = options.client;
      this.ownsClient = false;
    } else if (options.url) {
      this.client = new Redis(options.url, {
        commandTimeout: options.commandTimeout,
      });
      this.ownsClient = true;
    } else {
      this.client = new Redis({
        host: options.host || 'localhost',
        port: options.port || 6379,
        password: options.password,
        commandTimeout: options.commandTimeout,
      });
      this.ownsClient = true;
    }
  }

  /**
   * Initialize the Redis storage adapter
   */
  async initialize(): Promise<void> {
    // Test connection
    await this.client.ping();

    this.connections = [this.client];
    for (let i = 1; i < this.poolSize; i++) {
      this.connections.push(this.client.duplicate());
    }

    this.logger.log(
      `Initialized RedisStorageAdapter with ${this.connections.length} transaction connection(s)`,
    );
  }

  /**
   * Run a watch/commit cycle on the first idle connection of the pool.
   * When every connection is busy the cycle queues on the next one in turn.
   */
  async runExclusive<T>(
    work: (session: IStateStoreSession) => Promise<T>,
  ): Promise<T> {
    if (this.connections.length === 0) {
      this.connections = [this.client];
    }

    const index = this.pickConnection();
    const connection = this.connections[index];

    return this.lock.acquire(`connection:${index}`, async () => {
      const session = new RedisStoreSession(connection);
      try {
        return await work(session);
      } finally {
        if (session.watching) {
          await this.releaseWatch(connection, index);
        }
      }
    });
  }

  private pickConnection(): number {
    const idle = this.connections.findIndex(
      (_, index) => !this.lock.isBusy(`connection:${index}`),
    );
    if (idle !== -1) {
      return idle;
    }

    const index = this.nextConnection;
    this.nextConnection = (this.nextConnection + 1) % this.connections.length;
    return index;
  }

  /**
   * Plain GET, outside any transaction
   */
  async get(key: string): Promise<string | null> {
    try {
      return await this.client.get(key);
    } catch (error) {
      throw new StoreError(`GET ${key} failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async close(): Promise<void> {
    const duplicates = this.connections.filter((c) => c !== this.client);
    await Promise.all(duplicates.map((connection) => connection.quit()));
    this.connections = [];

    if (this.ownsClient) {
      await this.client.quit();
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.close();
  }

  private async releaseWatch(connection: Redis, index: number): Promise<void> {
    try {
      await connection.unwatch();
    } catch (error) {
      this.logger.error(
        `Failed to release watch on connection ${index}: ${describeError(error)}`,
      );
    }
  }
}
