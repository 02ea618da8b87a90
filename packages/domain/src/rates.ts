import { z } from 'zod';

/** Currency code → units of that currency per one unit of the base currency. */
export type RateTable = Readonly<Record<string, number>>;

export const RateValueSchema = z.number().finite().positive();

export const RateTableSchema = z.record(z.string().min(1), RateValueSchema);

/** Copy `rates` with upper-case keys, pinning the base currency at 1 when absent. */
export function normalizeRateTable(base: string, rates: Record<string, number>): RateTable {
  const table: Record<string, number> = {};
  for (const [code, rate] of Object.entries(rates)) {
    table[code.toUpperCase()] = rate;
  }
  if (table[base] === undefined) {
    table[base] = 1;
  }
  return Object.freeze(table);
}

/**
 * Re-express a table against another currency it contains.
 * Returns `undefined` when `base` is not in the table.
 */
export function rebaseRateTable(table: RateTable, base: string): RateTable | undefined {
  const pivot = table[base];
  if (pivot === undefined) {
    return undefined;
  }

  const rebased: Record<string, number> = {};
  for (const [code, rate] of Object.entries(table)) {
    rebased[code] = code === base ? 1 : rate / pivot;
  }
  return Object.freeze(rebased);
}
