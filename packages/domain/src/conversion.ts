import { z } from 'zod';
import { InvalidAmountError } from './errors.js';

export const ConversionRequestSchema = z.object({
  amount: z.union([z.number(), z.string()]),
  from: z.string(),
  to: z.string()
});

export type ConversionRequest = z.infer<typeof ConversionRequestSchema>;

export interface ConversionResult {
  amount: number;
  from: string;
  to: string;
  rateFrom: number;
  rateTo: number;
  result: number;
}

export interface ConversionRecord {
  amount: number;
  from: string;
  to: string;
  result: number;
  convertedAt: Date;
}

/**
 * Accept a finite positive number, or a string holding one.
 * Blank strings, NaN, infinities, zero and negatives are rejected.
 */
export function parseAmount(input: unknown): number {
  const value = typeof input === 'string' && input.trim().length > 0 ? Number(input.trim()) : input;

  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new InvalidAmountError(input);
  }

  return value;
}

/** Convert through the base currency: into base with `rateFrom`, out with `rateTo`. */
export function computeConvertedAmount(amount: number, rateFrom: number, rateTo: number): number {
  return (amount / rateFrom) * rateTo;
}

export function toConversionRecord(result: ConversionResult, convertedAt: Date = new Date()): ConversionRecord {
  return {
    amount: result.amount,
    from: result.from,
    to: result.to,
    result: result.result,
    convertedAt
  };
}

export function formatConversion(result: Pick<ConversionResult, 'amount' | 'from' | 'to' | 'result'>): string {
  return `${result.amount} ${result.from} = ${result.result} ${result.to}`;
}
