export {
  DEFAULT_ACTIVITY_LOG_CAPACITY,
  DEFAULT_BASE_CURRENCY,
  DEFAULT_RATE_FETCH_TIMEOUT_MS,
  RATE_CACHE_TTL_MS
} from './constants.js';
export {
  ERRORS,
  InvalidAmountError,
  PersistenceError,
  RATE_UNAVAILABLE_MESSAGE,
  RateNetworkError,
  RateParseError,
  UnknownCurrencyError,
  apiErrorFor,
  describeFailure,
  isConversionFailure,
  isRateFetchError,
  type ApiErrorDefinition,
  type ConversionFailure,
  type ConverterError,
  type RateFetchError
} from './errors.js';
export { normalizeCurrencyCode } from './currency.js';
export { RateTableSchema, RateValueSchema, normalizeRateTable, rebaseRateTable, type RateTable } from './rates.js';
export {
  ConversionRequestSchema,
  computeConvertedAmount,
  formatConversion,
  parseAmount,
  toConversionRecord,
  type ConversionRecord,
  type ConversionRequest,
  type ConversionResult
} from './conversion.js';
