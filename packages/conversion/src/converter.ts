import type { RateLookup } from '@fxconvert/adapters';
import { computeConvertedAmount, normalizeCurrencyCode, parseAmount, type ConversionResult } from '@fxconvert/domain';

export class CurrencyConverter {
  constructor(private readonly rates: RateLookup) {}

  /**
   * Convert `amount` of `from` into `to` through the base currency.
   *
   * The amount and both codes are validated before any rate lookup, so bad
   * input never reaches the network. Both rates are fetched concurrently.
   */
  async convert(amount: unknown, from: string, to: string): Promise<ConversionResult> {
    const value = parseAmount(amount);
    const fromCode = normalizeCurrencyCode(from);
    const toCode = normalizeCurrencyCode(to);

    const [rateFrom, rateTo] = await Promise.all([this.rates.getRate(fromCode), this.rates.getRate(toCode)]);

    return {
      amount: value,
      from: fromCode,
      to: toCode,
      rateFrom,
      rateTo,
      result: computeConvertedAmount(value, rateFrom, rateTo)
    };
  }
}
