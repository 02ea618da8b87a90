import { DEFAULT_BASE_CURRENCY, RATE_CACHE_TTL_MS, UnknownCurrencyError, type RateTable } from '@fxconvert/domain';
import { createServiceLogger, type ServiceLogger } from '@fxconvert/observability';
import type { RateLookup, RateSnapshot, RateSource } from './types.js';

interface CacheState {
    table: RateTable;
    fetchedAt: number;
}

export interface RateCacheOptions {
    base?: string;
    ttlMs?: number;
    /** Clock in epoch milliseconds. */
    now?: () => number;
    logger?: ServiceLogger;
}

/**
 * Time-boxed cache over a `RateSource`.
 *
 * The whole table is swapped in one assignment after a successful fetch, so a
 * reader sees either the previous table or the new one. Once `ttlMs` has
 * elapsed every lookup waits for a refresh, even for codes the stale table
 * still holds. Callers that arrive while a refresh is running share it.
 */
export class RateCache implements RateLookup {
    readonly base: string;
    private readonly ttlMs: number;
    private readonly now: () => number;
    private readonly logger: ServiceLogger;
    private state: CacheState | null = null;
    private inflight: Promise<CacheState> | null = null;

    constructor(
        private readonly source: RateSource,
        options: RateCacheOptions = {}
    ) {
        this.base = options.base ?? DEFAULT_BASE_CURRENCY;
        this.ttlMs = options.ttlMs ?? RATE_CACHE_TTL_MS;
        this.now = options.now ?? Date.now;
        this.logger = options.logger ?? createServiceLogger({ service: 'fx-rates' });
    }

    async getRate(currency: string): Promise<number> {
        const state = await this.currentState();
        const rate = state.table[currency];
        if (rate === undefined) {
            throw new UnknownCurrencyError(currency);
        }
        return rate;
    }

    snapshot(): RateSnapshot | null {
        if (!this.state) {
            return null;
        }
        return {
            base: this.base,
            rates: this.state.table,
            fetchedAt: new Date(this.state.fetchedAt),
            source: this.source.name
        };
    }

    isFresh(): boolean {
        return this.state !== null && this.isStateFresh(this.state);
    }

    /** Drop the current table; the next lookup refetches. */
    invalidate(): void {
        this.state = null;
    }

    private isStateFresh(state: CacheState): boolean {
        return Object.keys(state.table).length > 0 && this.now() - state.fetchedAt < this.ttlMs;
    }

    private async currentState(): Promise<CacheState> {
        const state = this.state;
        if (state && this.isStateFresh(state)) {
            return state;
        }
        return this.refresh();
    }

    private refresh(): Promise<CacheState> {
        if (this.inflight) {
            return this.inflight;
        }

        this.logger.debug('FX rate table stale, refreshing', { base: this.base, source: this.source.name });

        this.inflight = this.source
            .fetch(this.base)
            .then((table) => {
                const next: CacheState = { table, fetchedAt: this.now() };
                this.state = next;
                return next;
            })
            .catch((error: unknown) => {
                this.logger.warn('FX rate refresh failed', {
                    base: this.base,
                    source: this.source.name,
                    error: error instanceof Error ? error.message : String(error)
                });
                throw error;
            })
            .finally(() => {
                this.inflight = null;
            });

        return this.inflight;
    }
}
