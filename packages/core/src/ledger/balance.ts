import { Decimal } from 'decimal.js';
import type { LedgerOptions, Transaction } from '../types/index.js';
import { formatAmount } from '../utils/amount.js';
import { inScope, scopeOf, type Scope } from './scope.js';

/**
 * Snapshot balance: sum(credit) - sum(debit) over the given rows.
 */
export function computeBalance(rows: readonly Transaction[]): Decimal {
    let total = new Decimal(0);
    for (const txn of rows) {
        total = total.plus(new Decimal(txn.credit)).minus(new Decimal(txn.debit));
    }
    return total;
}

/**
 * Stamp the scope's snapshot balance onto every row of the scope.
 * Rows outside the scope are left untouched.
 *
 * PURE FUNCTION: Returns new array. Does not mutate input.
 */
export function restampBalance(rows: readonly Transaction[], scope: Scope): Transaction[] {
    const balance = formatAmount(computeBalance(rows.filter((txn) => inScope(txn, scope))));
    return rows.map((txn) => (inScope(txn, scope) ? { ...txn, balance } : { ...txn }));
}

export interface BalanceValidationResult {
    valid: boolean;
    errors: string[];
}

/**
 * Check that every row carries its scope's snapshot balance.
 * A table edited outside the engine can fail this until the next mutation.
 */
export function validateBalances(
    rows: readonly Transaction[],
    options: Pick<LedgerOptions, 'multiUser'>
): BalanceValidationResult {
    const errors: string[] = [];
    const expectedByScope = new Map<string, Decimal>();

    for (const txn of rows) {
        const scope = scopeOf(txn, options);
        const key = scope.kind === 'ledger' ? '*' : `user:${scope.user ?? ''}`;

        let expected = expectedByScope.get(key);
        if (!expected) {
            expected = computeBalance(rows.filter((other) => inScope(other, scope)));
            expectedByScope.set(key, expected);
        }

        if (!expected.equals(new Decimal(txn.balance))) {
            errors.push(`Row ${txn.id}: balance ${txn.balance}, expected ${formatAmount(expected)}`);
        }
    }

    return { valid: errors.length === 0, errors };
}
