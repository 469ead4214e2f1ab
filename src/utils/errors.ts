/**
 * Base class for errors raised by the token gate
 */
export class TokenGateError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A stored bucket record could not be decoded.
 * Recovered locally: the bucket is treated as absent.
 */
export class CorruptStateError extends TokenGateError {
  constructor(
    readonly reason: string,
    readonly rawLength: number,
  ) {
    super(`Corrupt bucket state (${reason}, ${rawLength} bytes)`);
  }
}

/**
 * The key-value store failed at transport or protocol level
 */
export class StoreError extends TokenGateError {}

/**
 * An admission attempt outlived its deadline before committing
 */
export class StoreTimeoutError extends StoreError {
  constructor(
    readonly key: string,
    readonly timeoutMs: number,
  ) {
    super(`Admission attempt on ${key} timed out after ${timeoutMs}ms`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
