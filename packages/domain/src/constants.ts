export const DEFAULT_BASE_CURRENCY = 'USD';

/** Rate tables older than this are refetched before any lookup. */
export const RATE_CACHE_TTL_MS = 10 * 60 * 1000;

export const DEFAULT_RATE_FETCH_TIMEOUT_MS = 5_000;

export const DEFAULT_ACTIVITY_LOG_CAPACITY = 100;
