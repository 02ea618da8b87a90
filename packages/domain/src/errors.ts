/**
 * Conversion error taxonomy.
 *
 * Every failure a conversion can produce is one of the classes below, each
 * tagged with a readonly `code`. Rate lookups and the converter throw them;
 * the conversion service hands them back as `Result` values so callers
 * switch on `code` instead of catching.
 */

export class InvalidAmountError extends Error {
  readonly code = 'INVALID_AMOUNT';

  constructor(readonly input: unknown) {
    super(`Amount must be a positive number, received "${String(input)}".`);
    this.name = 'InvalidAmountError';
  }
}

export class UnknownCurrencyError extends Error {
  readonly code = 'UNKNOWN_CURRENCY';

  constructor(readonly currency: string) {
    super(currency.length === 0 ? 'Currency code cannot be empty.' : `Unknown currency code: ${currency}.`);
    this.name = 'UnknownCurrencyError';
  }
}

export class RateNetworkError extends Error {
  readonly code = 'RATE_NETWORK_ERROR';

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RateNetworkError';
  }
}

export class RateParseError extends Error {
  readonly code = 'RATE_PARSE_ERROR';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RateParseError';
  }
}

export class PersistenceError extends Error {
  readonly code = 'PERSISTENCE_ERROR';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

export type RateFetchError = RateNetworkError | RateParseError;

/** Everything `convert` can fail with. */
export type ConversionFailure = InvalidAmountError | UnknownCurrencyError | RateFetchError;

export type ConverterError = ConversionFailure | PersistenceError;

export function isRateFetchError(error: unknown): error is RateFetchError {
  return error instanceof RateNetworkError || error instanceof RateParseError;
}

export function isConversionFailure(error: unknown): error is ConversionFailure {
  return error instanceof InvalidAmountError || error instanceof UnknownCurrencyError || isRateFetchError(error);
}

export const RATE_UNAVAILABLE_MESSAGE = 'Unable to fetch live rates. Please try again.';

/** Message shown to the person who asked for the conversion. */
export function describeFailure(error: ConverterError): string {
  switch (error.code) {
    case 'INVALID_AMOUNT':
    case 'UNKNOWN_CURRENCY':
      return error.message;
    case 'RATE_NETWORK_ERROR':
    case 'RATE_PARSE_ERROR':
      return RATE_UNAVAILABLE_MESSAGE;
    case 'PERSISTENCE_ERROR':
      return 'Conversion could not be saved to history.';
  }
}

// ── HTTP error registry ──

export interface ApiErrorDefinition {
  code: string;
  status: number;
  message: string;
}

export const ERRORS = {
  INVALID_PAYLOAD: { code: 'INVALID_PAYLOAD', status: 400, message: 'Invalid request payload.' },
  INVALID_AMOUNT: { code: 'INVALID_AMOUNT', status: 400, message: 'Amount must be a positive number.' },
  UNKNOWN_CURRENCY: { code: 'UNKNOWN_CURRENCY', status: 400, message: 'Unknown currency code.' },
  RATE_UNAVAILABLE: { code: 'RATE_UNAVAILABLE', status: 503, message: RATE_UNAVAILABLE_MESSAGE },
  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', status: 500, message: 'An unexpected internal error occurred.' }
} as const satisfies Record<string, ApiErrorDefinition>;

/** Map a conversion failure onto the HTTP error it is reported as. */
export function apiErrorFor(error: ConversionFailure): ApiErrorDefinition {
  switch (error.code) {
    case 'INVALID_AMOUNT':
      return { ...ERRORS.INVALID_AMOUNT, message: error.message };
    case 'UNKNOWN_CURRENCY':
      return { ...ERRORS.UNKNOWN_CURRENCY, message: error.message };
    case 'RATE_NETWORK_ERROR':
    case 'RATE_PARSE_ERROR':
      return ERRORS.RATE_UNAVAILABLE;
  }
}
