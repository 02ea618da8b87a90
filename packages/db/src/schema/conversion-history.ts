import { doublePrecision, pgTable, text } from 'drizzle-orm/pg-core';

/** One row per conversion shown to a user. Append-only; nothing reads it back in-process. */
export const conversionHistory = pgTable('conversion_history', {
  amount: doublePrecision('amount').notNull(),
  source: text('source').notNull(),
  target: text('target').notNull(),
  result: doublePrecision('result').notNull()
});

export type ConversionHistoryRow = typeof conversionHistory.$inferInsert;
