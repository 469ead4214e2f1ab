/**
 * Exclusive handle on one store connection for the length of a transaction.
 * Calls must not be interleaved with another session on the same connection.
 */
export interface IStateStoreSession {
  /**
   * Watch a key; a later commit is rejected if it changes in the meantime
   */
  watch(key: string): Promise<void>;

  /**
   * Read a value, null when the key is absent
   */
  get(key: string): Promise<string | null>;

  /**
   * Drop every watch of this session without writing
   */
  unwatch(): Promise<void>;

  /**
   * Atomically set the key if no watched key changed since the watch.
   * @returns false when the transaction was discarded because of a conflict
   */
  commit(key: string, value: string): Promise<boolean>;
}

/**
 * Interface for storage adapters that hold bucket state
 */
export interface IStateStorageAdapter {
  /**
   * Initialize the storage adapter
   */
  initialize(): Promise<void>;

  /**
   * Run a unit of work with exclusive use of a store connection
   * @param work Receives the session; its result is passed through
   */
  runExclusive<T>(work: (session: IStateStoreSession) => Promise<T>): Promise<T>;

  /**
   * Plain read, outside any transaction
   */
  get(key: string): Promise<string | null>;

  /**
   * Release the connections owned by the adapter
   */
  close(): Promise<void>;
}
