import { UnknownCurrencyError } from './errors.js';

const CURRENCY_CODE_PATTERN = /^[A-Z]{3}$/;

/** Trim and upper-case free-text input; anything but three letters is rejected. */
export function normalizeCurrencyCode(raw: string): string {
    const code = raw.trim().toUpperCase();
    if (!CURRENCY_CODE_PATTERN.test(code)) {
        throw new UnknownCurrencyError(code);
    }
    return code;
}
