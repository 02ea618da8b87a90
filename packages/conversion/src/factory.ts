import { ExchangeRateHostSource, RateCache, type RateSource } from '@fxconvert/adapters';
import type { ConverterServiceEnv } from '@fxconvert/config';
import type { ServiceLogger } from '@fxconvert/observability';
import { ConversionActivityLog } from './activity-log.js';
import { CurrencyConverter } from './converter.js';
import { ConversionHistoryRepository } from './repository.js';
import { ConversionService } from './service.js';
import type { RecordStore } from './types.js';

export interface ConversionStackOptions {
  env: ConverterServiceEnv;
  logger: ServiceLogger;
  /** Replaces the live endpoint, e.g. with a `StaticRateSource`. */
  source?: RateSource;
  /** Replaces the Postgres repository; `null` disables persistence. */
  store?: RecordStore | null;
}

export interface ConversionStack {
  rates: RateCache;
  store: RecordStore | null;
  converter: CurrencyConverter;
  activityLog: ConversionActivityLog;
  service: ConversionService;
}

export function createConversionStack(options: ConversionStackOptions): ConversionStack {
  const { env, logger } = options;

  const source =
    options.source ??
    new ExchangeRateHostSource({
      baseUrl: env.RATE_API_URL,
      ...(env.RATE_API_SYMBOLS ? { symbols: env.RATE_API_SYMBOLS } : {}),
      ...(env.RATE_API_KEY ? { accessKey: env.RATE_API_KEY } : {}),
      timeoutMs: env.RATE_FETCH_TIMEOUT_MS,
      logger: logger.child({ component: 'rate-source' })
    });

  const rates = new RateCache(source, {
    base: env.BASE_CURRENCY,
    ttlMs: env.RATE_CACHE_TTL_MS,
    logger: logger.child({ component: 'rate-cache' })
  });

  const store =
    options.store !== undefined ? options.store : env.CONVERSION_HISTORY_ENABLED ? new ConversionHistoryRepository() : null;

  const converter = new CurrencyConverter(rates);
  const activityLog = new ConversionActivityLog(logger.child({ component: 'activity-log' }), {
    capacity: env.ACTIVITY_LOG_CAPACITY
  });
  const service = new ConversionService({
    converter,
    activityLog,
    store,
    logger: logger.child({ component: 'conversion' })
  });

  return { rates, store, converter, activityLog, service };
}
