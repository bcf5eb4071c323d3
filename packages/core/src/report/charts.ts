/**
 * Data series behind the report charts. Rendering is left to the caller.
 */

import { Decimal } from 'decimal.js';
import type { CategoryTotal, ExpenditureShare, Transaction } from '../types/index.js';
import { formatAmount } from '../utils/amount.js';
import { compareText } from './build.js';

/**
 * Debit and credit per category ("income vs. expenditure" bars).
 */
export function categoryTotals(rows: readonly Transaction[]): CategoryTotal[] {
    const totals = new Map<string, { debit: Decimal; credit: Decimal }>();

    for (const txn of rows) {
        const stats = totals.get(txn.category) || { debit: new Decimal(0), credit: new Decimal(0) };
        stats.debit = stats.debit.plus(new Decimal(txn.debit));
        stats.credit = stats.credit.plus(new Decimal(txn.credit));
        totals.set(txn.category, stats);
    }

    return [...totals.entries()]
        .sort(([a], [b]) => compareText(a, b))
        .map(([category, stats]) => ({
            category,
            debit: formatAmount(stats.debit),
            credit: formatAmount(stats.credit),
        }));
}

/**
 * Each category's share of total debit, as a percentage with one decimal.
 * Empty when there is no debit at all. Categories without debit are omitted.
 */
export function expenditureShares(rows: readonly Transaction[]): ExpenditureShare[] {
    const totals = categoryTotals(rows);
    const totalDebit = totals.reduce((sum, t) => sum.plus(new Decimal(t.debit)), new Decimal(0));

    if (totalDebit.isZero()) {
        return [];
    }

    return totals
        .filter((t) => !new Decimal(t.debit).isZero())
        .map((t) => ({
            category: t.category,
            debit: t.debit,
            percent: new Decimal(t.debit).dividedBy(totalDebit).times(100).toFixed(1),
        }));
}

/**
 * credit - debit per row, in ledger order (the net-amount distribution).
 */
export function netAmounts(rows: readonly Transaction[]): string[] {
    return rows.map((txn) => formatAmount(new Decimal(txn.credit).minus(new Decimal(txn.debit))));
}
