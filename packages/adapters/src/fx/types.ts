import type { RateTable } from '@fxconvert/domain';

/** One way of obtaining a full rate table for a base currency. */
export interface RateSource {
    readonly name: string;
    /**
     * Fetch every rate quoted against `base`.
     * Rejects with `RateNetworkError` or `RateParseError`.
     */
    fetch(base: string): Promise<RateTable>;
}

/** Single-currency lookup against the active rate table. */
export interface RateLookup {
    /** Rejects with `UnknownCurrencyError`, or the source's error when a refresh fails. */
    getRate(currency: string): Promise<number>;
}

export interface RateSnapshot {
    base: string;
    rates: RateTable;
    fetchedAt: Date;
    source: string;
}
