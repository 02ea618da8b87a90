import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { RateNetworkError, RateParseError, UnknownCurrencyError, type RateTable } from '@fxconvert/domain';
import { createServiceLogger } from '@fxconvert/observability';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ExchangeRateHostSource } from '../src/fx/exchange-rate-host.js';
import { RateCache } from '../src/fx/rate-cache.js';
import { StaticRateSource, loadStaticRateSource } from '../src/fx/static-rates.js';
import type { RateSource } from '../src/fx/types.js';

const logger = createServiceLogger({ service: 'fx-test', minLevel: 'error' });

function mockFetchJson(body: unknown, status = 200) {
    return vi.fn().mockResolvedValue({
        ok: status >= 200 && status < 300,
        status,
        json: async () => body
    });
}

describe('ExchangeRateHostSource', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('fetches the latest table for the base currency', async () => {
        const fetchMock = mockFetchJson({ base: 'USD', rates: { inr: 83, EUR: 0.9 } });
        vi.stubGlobal('fetch', fetchMock);

        const table = await new ExchangeRateHostSource({ logger }).fetch('USD');

        expect(table).toEqual({ INR: 83, EUR: 0.9, USD: 1 });
        expect(fetchMock).toHaveBeenCalledTimes(1);
        expect(fetchMock).toHaveBeenCalledWith(
            'https://api.exchangerate.host/latest?base=USD',
            expect.objectContaining({ headers: { accept: 'application/json' } })
        );
    });

    it('adds symbols and the access key to the query string', () => {
        const source = new ExchangeRateHostSource({
            baseUrl: 'https://rates.example.test/v1',
            symbols: ['INR', 'EUR'],
            accessKey: 'test-key',
            logger
        });

        expect(source.buildUrl('USD')).toBe('https://rates.example.test/v1/latest?base=USD&symbols=INR%2CEUR&access_key=test-key');
    });

    it('reports a non-2xx status as a network error', async () => {
        vi.stubGlobal('fetch', mockFetchJson({}, 503));

        await expect(new ExchangeRateHostSource({ logger }).fetch('USD')).rejects.toMatchObject({
            code: 'RATE_NETWORK_ERROR',
            status: 503,
            message: 'Rate endpoint responded with status 503.'
        });
    });

    it('reports a connection failure as a network error', async () => {
        vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

        const attempt = new ExchangeRateHostSource({ logger }).fetch('USD');

        await expect(attempt).rejects.toBeInstanceOf(RateNetworkError);
        await expect(attempt).rejects.toThrow('Rate request failed: fetch failed');
    });

    it('reports a timeout as a network error', async () => {
        const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
        vi.stubGlobal('fetch', vi.fn().mockRejectedValue(timeout));

        await expect(new ExchangeRateHostSource({ timeoutMs: 250, logger }).fetch('USD')).rejects.toThrow(
            'Rate request timed out after 250 ms.'
        );
    });

    it('reports a body that is not JSON as a parse error', async () => {
        vi.stubGlobal(
            'fetch',
            vi.fn().mockResolvedValue({
                ok: true,
                status: 200,
                json: async () => {
                    throw new SyntaxError('Unexpected token < in JSON at position 0');
                }
            })
        );

        await expect(new ExchangeRateHostSource({ logger }).fetch('USD')).rejects.toBeInstanceOf(RateParseError);
    });

    it('reports a payload without rates as a parse error', async () => {
        vi.stubGlobal('fetch', mockFetchJson({ success: false, error: { code: 101, type: 'missing_access_key' } }));

        await expect(new ExchangeRateHostSource({ logger }).fetch('USD')).rejects.toThrow(
            /^Rate endpoint returned a malformed rates table at rates: /
        );
    });

    it('rejects tables holding non-positive rates', async () => {
        vi.stubGlobal('fetch', mockFetchJson({ rates: { USD: 1, INR: -83 } }));

        await expect(new ExchangeRateHostSource({ logger }).fetch('USD')).rejects.toMatchObject({ code: 'RATE_PARSE_ERROR' });
    });
});

describe('StaticRateSource', () => {
    it('serves its table for its own base', async () => {
        const source = new StaticRateSource('USD', { INR: 83, EUR: 0.5 });
        await expect(source.fetch('USD')).resolves.toEqual({ INR: 83, EUR: 0.5, USD: 1 });
    });

    it('rebases onto another currency in the table', async () => {
        const source = new StaticRateSource('USD', { USD: 1, EUR: 0.5 });
        await expect(source.fetch('EUR')).resolves.toEqual({ USD: 2, EUR: 1 });
    });

    it('fails for a base currency outside the table', async () => {
        await expect(new StaticRateSource('USD', { INR: 83 }).fetch('GBP')).rejects.toBeInstanceOf(RateParseError);
    });

    it('rejects invalid tables up front', () => {
        expect(() => new StaticRateSource('USD', { INR: 0 })).toThrow(RateParseError);
    });

    it('loads a rate file from disk', async () => {
        const dir = await mkdtemp(path.join(tmpdir(), 'fx-rates-'));
        const file = path.join(dir, 'rates.json');
        await writeFile(file, JSON.stringify({ base: 'usd', rates: { INR: 83, EUR: 0.9 } }), 'utf8');

        const source = await loadStaticRateSource(file);

        await expect(source.fetch('USD')).resolves.toEqual({ INR: 83, EUR: 0.9, USD: 1 });
    });

    it('reports a missing rate file as a parse error', async () => {
        await expect(loadStaticRateSource(path.join(tmpdir(), 'fx-rates-missing', 'none.json'))).rejects.toThrow(/^Cannot read rate file/);
    });
});

describe('RateCache', () => {
    const TTL_MS = 10 * 60 * 1000;

    function stubSource(table: RateTable = { USD: 1, INR: 83, EUR: 0.9 }) {
        const fetch = vi.fn(async (_base: string): Promise<RateTable> => table);
        const source: RateSource = { name: 'stub', fetch };
        return { source, fetch };
    }

    it('does not refetch within the TTL window', async () => {
        let now = 1_000;
        const { source, fetch } = stubSource();
        const cache = new RateCache(source, { ttlMs: TTL_MS, now: () => now, logger });

        await expect(cache.getRate('INR')).resolves.toBe(83);
        now += TTL_MS - 1;
        await expect(cache.getRate('EUR')).resolves.toBe(0.9);

        expect(fetch).toHaveBeenCalledTimes(1);
        expect(fetch).toHaveBeenCalledWith('USD');
    });

    it('fetches exactly once more after the TTL elapses, even for a cached code', async () => {
        let now = 1_000;
        const { source, fetch } = stubSource();
        const cache = new RateCache(source, { ttlMs: TTL_MS, now: () => now, logger });

        await cache.getRate('INR');
        now += TTL_MS;
        await cache.getRate('INR');
        await cache.getRate('EUR');

        expect(fetch).toHaveBeenCalledTimes(2);
    });

    it('fails with UnknownCurrencyError for a code outside the table', async () => {
        const { source } = stubSource();
        const cache = new RateCache(source, { logger });

        await expect(cache.getRate('XXX')).rejects.toBeInstanceOf(UnknownCurrencyError);
        await expect(cache.getRate('XXX')).rejects.toMatchObject({ code: 'UNKNOWN_CURRENCY', currency: 'XXX' });
    });

    it('shares one in-flight fetch between concurrent callers', async () => {
        let release: (table: RateTable) => void = () => undefined;
        const fetch = vi.fn(
            (_base: string) =>
                new Promise<RateTable>((resolve) => {
                    release = resolve;
                })
        );
        const cache = new RateCache({ name: 'slow', fetch }, { logger });

        const lookups = Promise.all([cache.getRate('USD'), cache.getRate('INR'), cache.getRate('EUR')]);
        release({ USD: 1, INR: 83, EUR: 0.9 });

        await expect(lookups).resolves.toEqual([1, 83, 0.9]);
        expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('propagates a failed refresh and tries again on the next lookup', async () => {
        const fetch = vi
            .fn<(base: string) => Promise<RateTable>>()
            .mockRejectedValueOnce(new RateNetworkError('Rate request failed: fetch failed'))
            .mockResolvedValueOnce({ USD: 1, INR: 83 });
        const cache = new RateCache({ name: 'flaky', fetch }, { logger });

        await expect(cache.getRate('INR')).rejects.toBeInstanceOf(RateNetworkError);
        expect(cache.snapshot()).toBeNull();
        await expect(cache.getRate('INR')).resolves.toBe(83);
        expect(fetch).toHaveBeenCalledTimes(2);
    });

    it('does not serve a stale table when the refresh fails', async () => {
        let now = 0;
        const fetch = vi
            .fn<(base: string) => Promise<RateTable>>()
            .mockResolvedValueOnce({ USD: 1, INR: 83 })
            .mockRejectedValueOnce(new RateParseError('Rate endpoint returned a body that is not JSON.'));
        const cache = new RateCache({ name: 'flaky', fetch }, { ttlMs: TTL_MS, now: () => now, logger });

        await cache.getRate('INR');
        now = TTL_MS;

        await expect(cache.getRate('INR')).rejects.toBeInstanceOf(RateParseError);
    });

    it('exposes a snapshot of the active table and can be invalidated', async () => {
        const { source, fetch } = stubSource({ USD: 1, INR: 83 });
        const cache = new RateCache(source, { base: 'USD', now: () => 1_700_000_000_000, logger });

        expect(cache.snapshot()).toBeNull();
        await cache.getRate('INR');

        expect(cache.snapshot()).toEqual({
            base: 'USD',
            rates: { USD: 1, INR: 83 },
            fetchedAt: new Date(1_700_000_000_000),
            source: 'stub'
        });
        expect(cache.isFresh()).toBe(true);

        cache.invalidate();
        expect(cache.isFresh()).toBe(false);
        await cache.getRate('USD');
        expect(fetch).toHaveBeenCalledTimes(2);
    });
});
