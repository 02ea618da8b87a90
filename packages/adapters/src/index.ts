export { ExchangeRateHostSource, type ExchangeRateHostOptions } from './fx/exchange-rate-host.js';
export { RateCache, type RateCacheOptions } from './fx/rate-cache.js';
export { StaticRateSource, loadStaticRateSource } from './fx/static-rates.js';
export type { RateLookup, RateSnapshot, RateSource } from './fx/types.js';
