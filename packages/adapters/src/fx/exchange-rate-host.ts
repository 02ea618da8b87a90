import { DEFAULT_RATE_FETCH_TIMEOUT_MS, RateNetworkError, RateParseError, RateTableSchema, normalizeRateTable, type RateTable } from '@fxconvert/domain';
import { createServiceLogger, type ServiceLogger } from '@fxconvert/observability';
import { z } from 'zod';
import type { RateSource } from './types.js';

export interface ExchangeRateHostOptions {
    /** Endpoint root; `/latest` is appended. */
    baseUrl?: string;
    /** Restrict the table to these codes (`&symbols=`). */
    symbols?: string[];
    /** Sent as `access_key` when the endpoint requires one. */
    accessKey?: string;
    timeoutMs?: number;
    logger?: ServiceLogger;
}

const latestRatesSchema = z.object({
    rates: RateTableSchema.refine((rates) => Object.keys(rates).length > 0, { message: 'rates is empty' })
});

function isAbort(error: unknown): boolean {
    return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Live rates from an exchangerate.host-compatible endpoint:
 * `GET <baseUrl>/latest?base=<CODE>[&symbols=<A,B>]` answering `{ "rates": { "<CODE>": <number> } }`.
 *
 * One attempt per call, bounded by `timeoutMs`. No retry and no caching here;
 * `RateCache` owns freshness.
 */
export class ExchangeRateHostSource implements RateSource {
    readonly name = 'exchangerate-host';
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly logger: ServiceLogger;

    constructor(private readonly options: ExchangeRateHostOptions = {}) {
        this.baseUrl = options.baseUrl ?? 'https://api.exchangerate.host';
        this.timeoutMs = options.timeoutMs ?? DEFAULT_RATE_FETCH_TIMEOUT_MS;
        this.logger = options.logger ?? createServiceLogger({ service: 'fx-rates' });
    }

    buildUrl(base: string): string {
        const root = this.baseUrl.endsWith('/') ? this.baseUrl : `${this.baseUrl}/`;
        const url = new URL('latest', root);
        url.searchParams.set('base', base);
        if (this.options.symbols && this.options.symbols.length > 0) {
            url.searchParams.set('symbols', this.options.symbols.join(','));
        }
        if (this.options.accessKey) {
            url.searchParams.set('access_key', this.options.accessKey);
        }
        return url.toString();
    }

    async fetch(base: string): Promise<RateTable> {
        const started = Date.now();
        const body = await this.request(base);

        const parsed = latestRatesSchema.safeParse(body);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
            throw new RateParseError(`Rate endpoint returned a malformed rates table${where}: ${issue?.message ?? 'invalid'}`);
        }

        const table = normalizeRateTable(base, parsed.data.rates);
        this.logger.info('FX rates fetched', {
            base,
            currencyCount: Object.keys(table).length,
            durationMs: Date.now() - started
        });
        return table;
    }

    private async request(base: string): Promise<unknown> {
        let response: Response;
        try {
            response = await fetch(this.buildUrl(base), {
                headers: { accept: 'application/json' },
                signal: AbortSignal.timeout(this.timeoutMs)
            });
        } catch (error) {
            throw new RateNetworkError(
                isAbort(error)
                    ? `Rate request timed out after ${this.timeoutMs} ms.`
                    : `Rate request failed: ${error instanceof Error ? error.message : String(error)}`,
                undefined,
                { cause: error }
            );
        }

        if (!response.ok) {
            throw new RateNetworkError(`Rate endpoint responded with status ${response.status}.`, response.status);
        }

        try {
            return await response.json();
        } catch (error) {
            if (isAbort(error)) {
                throw new RateNetworkError(`Rate request timed out after ${this.timeoutMs} ms.`, undefined, { cause: error });
            }
            throw new RateParseError('Rate endpoint returned a body that is not JSON.', { cause: error });
        }
    }
}
