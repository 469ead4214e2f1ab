import { Injectable } from '@nestjs/common';
import {
  IStateStorageAdapter,
  IStateStoreSession,
} from '../interfaces/storage-adapter.interface';

interface VersionedValue {
  value: string;
  version: number;
}

class MemoryStoreSession implements IStateStoreSession {
  private readonly watched = new Map<string, number>();

  constructor(private readonly store: MemoryStorageAdapter) {}

  async watch(key: string): Promise<void> {
    this.watched.set(key, this.store.versionOf(key));
  }

  async get(key: string): Promise<string | null> {
    return this.store.read(key);
  }

  async unwatch(): Promise<void> {
    this.watched.clear();
  }

  async commit(key: string, value: string): Promise<boolean> {
    const unchanged = [...this.watched].every(
      ([watchedKey, version]) => this.store.versionOf(watchedKey) === version,
    );
    this.watched.clear();

    if (!unchanged) {
      return false;
    }
    this.store.write(key, value);
    return true;
  }
}

/**
 * In-memory storage adapter for TokenGate
 * Each session behaves like its own connection; values carry a version so that
 * watched keys can be checked at commit. Suitable for development and testing.
 */
@Injectable()
export class MemoryStorageAdapter implements IStateStorageAdapter {
  private readonly values = new Map<string, VersionedValue>();

  /**
   * Initialize the storage adapter
   */
  async initialize(): Promise<void> {
    // Nothing to do for memory adapter
  }

  async runExclusive<T>(
    work: (session: IStateStoreSession) => Promise<T>,
  ): Promise<T> {
    return work(new MemoryStoreSession(this));
  }

  async get(key: string): Promise<string | null> {
    return this.read(key);
  }

  /**
   * Write a value outside any transaction, bumping its version
   */
  async set(key: string, value: string): Promise<void> {
    this.write(key, value);
  }

  async close(): Promise<void> {
    this.values.clear();
  }

  read(key: string): string | null {
    return this.values.get(key)?.value ?? null;
  }

  write(key: string, value: string): void {
    this.values.set(key, { value, version: this.versionOf(key) + 1 });
  }

  versionOf(key: string): number {
    return this.values.get(key)?.version ?? 0;
  }
}
