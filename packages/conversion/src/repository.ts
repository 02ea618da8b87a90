import { db as defaultDb, type Queryable } from '@fxconvert/db';
import { PersistenceError, type ConversionRecord } from '@fxconvert/domain';
import type { RecordStore } from './types.js';

export class ConversionHistoryRepository implements RecordStore {
  constructor(private readonly db: Queryable = defaultDb) {}

  async save(record: ConversionRecord): Promise<void> {
    try {
      await this.db.query(
        `
        insert into conversion_history (
          amount,
          source,
          target,
          result
        ) values ($1, $2, $3, $4)
        `,
        [record.amount, record.from, record.to, record.result]
      );
    } catch (error) {
      throw new PersistenceError(
        `Failed to save conversion ${record.from}->${record.to}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }
}
