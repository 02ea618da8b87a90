import { StaticRateSource, RateCache, type RateSource } from '@fxconvert/adapters';
import { PersistenceError, RateNetworkError, type ConversionRecord, type RateTable } from '@fxconvert/domain';
import { describe, expect, it, vi } from 'vitest';
import { ConversionActivityLog } from '../src/activity-log.js';
import { CurrencyConverter } from '../src/converter.js';
import { ConversionService } from '../src/service.js';
import type { RecordStore } from '../src/types.js';
import { fakeLogger } from './helpers.js';

class InMemoryRecordStore implements RecordStore {
  readonly records: ConversionRecord[] = [];

  async save(record: ConversionRecord): Promise<void> {
    this.records.push(record);
  }
}

const convertedAt = new Date('2026-03-01T09:30:00.000Z');

function buildService(options: { source?: RateSource; store?: RecordStore | null } = {}) {
  const { logger, warn } = fakeLogger();
  const source = options.source ?? new StaticRateSource('USD', { USD: 1, INR: 83, EUR: 0.9 });
  const activityLog = new ConversionActivityLog(logger);
  const service = new ConversionService({
    converter: new CurrencyConverter(new RateCache(source, { logger })),
    activityLog,
    store: options.store === undefined ? new InMemoryRecordStore() : options.store,
    logger,
    now: () => convertedAt
  });
  return { service, activityLog, warn };
}

describe('ConversionService.convert', () => {
  it('returns the conversion as an ok result', async () => {
    const { service } = buildService();

    const outcome = await service.convert({ amount: 100, from: 'usd', to: 'inr' });

    expect(outcome.isOk()).toBe(true);
    expect(outcome._unsafeUnwrap().result).toBe(8300);
  });

  it('returns validation failures as tagged errors', async () => {
    const { service } = buildService();

    const invalid = await service.convert({ amount: -5, from: 'USD', to: 'INR' });
    const unknown = await service.convert({ amount: 5, from: 'USD', to: 'XXX' });

    expect(invalid._unsafeUnwrapErr().code).toBe('INVALID_AMOUNT');
    expect(unknown._unsafeUnwrapErr().code).toBe('UNKNOWN_CURRENCY');
  });

  it('returns fetch failures as tagged errors', async () => {
    const fetch = vi.fn(async (_base: string): Promise<RateTable> => {
      throw new RateNetworkError('Rate request timed out after 5000 ms.');
    });
    const { service } = buildService({ source: { name: 'down', fetch } });

    const outcome = await service.convert({ amount: 5, from: 'USD', to: 'INR' });

    expect(outcome._unsafeUnwrapErr()).toBeInstanceOf(RateNetworkError);
  });

  it('rethrows errors outside the conversion taxonomy', async () => {
    const fetch = vi.fn(async (_base: string): Promise<RateTable> => {
      throw new RangeError('unexpected');
    });
    const { service } = buildService({ source: { name: 'broken', fetch } });

    await expect(service.convert({ amount: 5, from: 'USD', to: 'INR' })).rejects.toBeInstanceOf(RangeError);
  });
});

describe('ConversionService.record', () => {
  it('saves the record and appends it to the history', async () => {
    const store = new InMemoryRecordStore();
    const { service, activityLog } = buildService({ store });
    const result = (await service.convert({ amount: 100, from: 'USD', to: 'INR' }))._unsafeUnwrap();

    const saved = await service.record(result);
    await activityLog.idle();

    const expected = { amount: 100, from: 'USD', to: 'INR', result: 8300, convertedAt };
    expect(saved._unsafeUnwrap()).toEqual(expected);
    expect(store.records).toEqual([expected]);
    expect(service.history()).toEqual([expected]);
  });

  it('swallows a failing save without touching the reported result', async () => {
    const store: RecordStore = {
      save: vi.fn(async () => {
        throw new Error('EIO: i/o error, write');
      })
    };
    const { service, warn } = buildService({ store });
    const result = (await service.convert({ amount: 100, from: 'USD', to: 'INR' }))._unsafeUnwrap();
    const shown = { ...result };

    const saved = await service.record(result);

    expect(result).toEqual(shown);
    expect(saved._unsafeUnwrapErr()).toBeInstanceOf(PersistenceError);
    expect(saved._unsafeUnwrapErr().message).toBe('Failed to save conversion: EIO: i/o error, write');
    expect(warn).toHaveBeenCalledWith('conversion record not saved', {
      code: 'PERSISTENCE_ERROR',
      error: 'Failed to save conversion: EIO: i/o error, write'
    });
    expect(service.history()).toHaveLength(1);
  });

  it('skips persistence when history storage is disabled', async () => {
    const { service } = buildService({ store: null });
    const result = (await service.convert({ amount: 1, from: 'EUR', to: 'USD' }))._unsafeUnwrap();

    const saved = await service.record(result);

    expect(saved.isOk()).toBe(true);
    expect(service.history()).toHaveLength(1);
  });
});
