import { readFile } from 'node:fs/promises';
import { RateParseError, RateTableSchema, normalizeRateTable, rebaseRateTable, type RateTable } from '@fxconvert/domain';
import { z } from 'zod';
import type { RateSource } from './types.js';

const rateFileSchema = z.object({
    base: z
        .string()
        .regex(/^[A-Za-z]{3}$/)
        .transform((value) => value.toUpperCase()),
    rates: RateTableSchema
});

/** Fixed rate table, for offline use and tests. */
export class StaticRateSource implements RateSource {
    readonly name = 'static';
    private readonly table: RateTable;

    constructor(
        private readonly base: string,
        rates: Record<string, number>
    ) {
        const parsed = RateTableSchema.safeParse(rates);
        if (!parsed.success) {
            throw new RateParseError(`Static rate table is invalid: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
        }
        this.table = normalizeRateTable(base, parsed.data);
    }

    async fetch(base: string): Promise<RateTable> {
        if (base === this.base) {
            return this.table;
        }

        const rebased = rebaseRateTable(this.table, base);
        if (!rebased) {
            throw new RateParseError(`Static rate table has no rate for base currency ${base}.`);
        }
        return rebased;
    }
}

/** Read `{ "base": "USD", "rates": { ... } }` from disk. */
export async function loadStaticRateSource(path: string): Promise<StaticRateSource> {
    let raw: string;
    try {
        raw = await readFile(path, 'utf8');
    } catch (error) {
        throw new RateParseError(`Cannot read rate file ${path}: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new RateParseError(`Rate file ${path} is not valid JSON.`, { cause: error });
    }

    const parsed = rateFileSchema.safeParse(json);
    if (!parsed.success) {
        throw new RateParseError(`Rate file ${path} is malformed: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    return new StaticRateSource(parsed.data.base, parsed.data.rates);
}
