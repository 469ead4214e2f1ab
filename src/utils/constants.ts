/**
 * Injection token for the resolved TokenGate configuration
 */
export const TOKEN_GATE_CONFIG = 'TOKEN_GATE_CONFIG';

/**
 * Injection token for the TokenGate storage adapter
 */
export const TOKEN_GATE_STORAGE_ADAPTER = 'TOKEN_GATE_STORAGE_ADAPTER';

export const DEFAULT_KEY_PREFIX = 'bucket:';
export const DEFAULT_MAX_TOKENS = 10;
export const DEFAULT_REFILL_RATE_PER_HOUR = 1;
export const DEFAULT_MAX_RETRIES = 5;
export const MAX_RETRIES_LIMIT = 20;
export const DEFAULT_ATTEMPT_TIMEOUT_MS = 2000;
export const DEFAULT_IDENTITY_HEADER = 'bearer';

export const HOUR_MS = 60 * 60 * 1000;
