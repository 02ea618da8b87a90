import {
  PersistenceError,
  isConversionFailure,
  toConversionRecord,
  type ConversionFailure,
  type ConversionRecord,
  type ConversionRequest,
  type ConversionResult
} from '@fxconvert/domain';
import type { ServiceLogger } from '@fxconvert/observability';
import { err, ok, type Result } from 'neverthrow';
import type { ConversionActivityLog } from './activity-log.js';
import type { CurrencyConverter } from './converter.js';
import type { RecordStore } from './types.js';

export interface ConversionServiceDeps {
  converter: CurrencyConverter;
  activityLog: ConversionActivityLog;
  logger: ServiceLogger;
  /** `null` when conversion history is disabled. */
  store: RecordStore | null;
  now?: () => Date;
}

/**
 * Entry point shared by the console and the HTTP surface.
 *
 * Converter failures come back as tagged `Result` errors instead of being
 * thrown; anything outside that taxonomy is a bug and still throws.
 */
export class ConversionService {
  private readonly now: () => Date;

  constructor(private readonly deps: ConversionServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async convert(request: ConversionRequest): Promise<Result<ConversionResult, ConversionFailure>> {
    try {
      const result = await this.deps.converter.convert(request.amount, request.from, request.to);
      this.deps.logger.debug('conversion completed', {
        from: result.from,
        to: result.to,
        rateFrom: result.rateFrom,
        rateTo: result.rateTo
      });
      return ok(result);
    } catch (error) {
      if (isConversionFailure(error)) {
        this.deps.logger.info('conversion rejected', { code: error.code, reason: error.message });
        return err(error);
      }
      throw error;
    }
  }

  /**
   * Persist a conversion that has already been shown, then hand it to the
   * activity log. A failed save is logged and returned; it never throws.
   */
  async record(result: ConversionResult): Promise<Result<ConversionRecord, PersistenceError>> {
    const record = toConversionRecord(result, this.now());
    const saved = await this.save(record);
    this.deps.activityLog.append(record);
    return saved;
  }

  history(): readonly ConversionRecord[] {
    return this.deps.activityLog.snapshot();
  }

  private async save(record: ConversionRecord): Promise<Result<ConversionRecord, PersistenceError>> {
    const store = this.deps.store;
    if (!store) {
      return ok(record);
    }

    try {
      await store.save(record);
      return ok(record);
    } catch (error) {
      const failure =
        error instanceof PersistenceError
          ? error
          : new PersistenceError(`Failed to save conversion: ${error instanceof Error ? error.message : String(error)}`, {
              cause: error
            });
      this.deps.logger.warn('conversion record not saved', { code: failure.code, error: failure.message });
      return err(failure);
    }
  }
}
