import { z } from 'zod';

function emptyStringToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.trim().length === 0) {
    return undefined;
  }
  return value;
}

function splitCodes(value: string): string[] {
  return value
    .split(',')
    .map((code) => code.trim().toUpperCase())
    .filter((code) => code.length > 0);
}

const currencyCode = z
  .string()
  .regex(/^[A-Za-z]{3}$/, 'must be a three-letter currency code')
  .transform((value) => value.toUpperCase());

const codeList = z
  .string()
  .transform(splitCodes)
  .refine((codes) => codes.every((code) => /^[A-Z]{3}$/.test(code)), {
    message: 'must be a comma-separated list of three-letter currency codes'
  });

const boolFromString = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((value) => value === 'true');

const converterSchema = z.object({
  RATE_API_URL: z.string().url().default('https://api.exchangerate.host'),
  RATE_API_SYMBOLS: z.preprocess(emptyStringToUndefined, codeList.optional()),
  RATE_API_KEY: z.preprocess(emptyStringToUndefined, z.string().min(1).optional()),
  BASE_CURRENCY: currencyCode.default('USD'),
  RATE_CACHE_TTL_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  RATE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().max(60_000).default(5_000),
  CONVERSION_HISTORY_ENABLED: boolFromString('true'),
  ACTIVITY_LOG_CAPACITY: z.coerce.number().int().positive().max(10_000).default(100)
});

const converterCliSchema = converterSchema.extend({
  CONVERTER_CLI_CURRENCIES: codeList.default('USD,INR,EUR,GBP,AUD,CAD,JPY')
});

export type ConverterServiceEnv = z.infer<typeof converterSchema>;
export type ConverterCliEnv = z.infer<typeof converterCliSchema>;

export function loadConverterServiceEnv(input: NodeJS.ProcessEnv = process.env): ConverterServiceEnv {
  return converterSchema.parse(input);
}

export function loadConverterCliEnv(input: NodeJS.ProcessEnv = process.env): ConverterCliEnv {
  return converterCliSchema.parse(input);
}
