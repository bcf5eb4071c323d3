/**
 * Money parsing and formatting.
 *
 * Debit and credit input is lenient: anything that is not a non-negative
 * number becomes zero rather than an error.
 */

import { Decimal } from 'decimal.js';
import { AMOUNT_SCALE } from '../types/index.js';

const AMOUNT_PATTERN = /^\d+(\.\d+)?$/;
const SIGNED_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Parse a debit/credit value. Accepts numbers and strings such as
 * "1,250.50" or "$40". Blank, unparseable and negative values give zero.
 */
export function parseAmount(value: unknown): Decimal {
    if (typeof value === 'number') {
        return Number.isFinite(value) && value >= 0 ? new Decimal(value) : new Decimal(0);
    }
    if (typeof value === 'string') {
        const cleaned = value.trim().replace(/^\$/, '').replace(/,/g, '');
        return AMOUNT_PATTERN.test(cleaned) ? new Decimal(cleaned) : new Decimal(0);
    }
    return new Decimal(0);
}

/**
 * Parse a stored signed value (the balance column). Unreadable values give zero.
 */
export function parseSignedAmount(value: unknown): Decimal {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? new Decimal(value) : new Decimal(0);
    }
    if (typeof value === 'string') {
        const cleaned = value.trim().replace(/,/g, '');
        return SIGNED_PATTERN.test(cleaned) ? new Decimal(cleaned) : new Decimal(0);
    }
    return new Decimal(0);
}

/**
 * Format as a fixed two-place decimal string, e.g. "500.00" or "-12.50".
 */
export function formatAmount(value: Decimal): string {
    return value.toFixed(AMOUNT_SCALE);
}

export function normalizeAmount(value: unknown): string {
    return formatAmount(parseAmount(value));
}

/**
 * Sum decimal strings.
 */
export function sumAmounts(values: Iterable<string>): Decimal {
    let total = new Decimal(0);
    for (const value of values) {
        total = total.plus(new Decimal(value));
    }
    return total;
}
