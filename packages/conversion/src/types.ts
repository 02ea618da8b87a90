import type { ConversionRecord } from '@fxconvert/domain';

/** Where finished conversions are persisted. */
export interface RecordStore {
  /** Rejects with `PersistenceError` when the write fails. */
  save(record: ConversionRecord): Promise<void>;
}
