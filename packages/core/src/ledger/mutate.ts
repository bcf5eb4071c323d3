/**
 * Ledger mutations as pure functions over the full row list.
 *
 * Each returns a new array with the affected scope restamped, so the caller
 * only has to save the result. Inputs are never mutated.
 */

import type { LedgerOptions, Transaction, TransactionInput } from '../types/index.js';
import { InvalidCategoryError } from '../types/index.js';
import { toIsoDate } from '../utils/date-parse.js';
import { normalizeAmount } from '../utils/amount.js';
import { nextFreeId, sameId } from '../utils/ledger-id.js';
import { restampBalance } from './balance.js';
import { inScope, normalizeUser, scopeFor, scopeOf, type Scope } from './scope.js';

/**
 * Input after validation: ISO date, trimmed labels, two-place amounts.
 * `user` is only kept in multi-user mode.
 */
export interface NormalizedInput {
    date: string;
    category: string;
    subhead: string;
    debit: string;
    credit: string;
    user?: string;
}

export interface MutationResult {
    rows: Transaction[];
    transaction: Transaction;
}

export interface RemovalResult {
    rows: Transaction[];
    removed: Transaction | null;
}

/**
 * Validate and normalize operator input.
 *
 * @throws InvalidDateError for an unparseable date
 * @throws InvalidCategoryError for a blank or unconfigured category
 */
export function normalizeInput(input: TransactionInput, options: LedgerOptions): NormalizedInput {
    const date = toIsoDate(input.date);

    const category = input.category.trim();
    if (category === '' || (options.categories.length > 0 && !options.categories.includes(category))) {
        throw new InvalidCategoryError(input.category, options.categories);
    }

    const normalized: NormalizedInput = {
        date,
        category,
        subhead: (input.subhead ?? '').trim(),
        debit: normalizeAmount(input.debit),
        credit: normalizeAmount(input.credit),
    };

    const user = options.multiUser ? normalizeUser(input.user) : undefined;
    if (user !== undefined) {
        normalized.user = user;
    }
    return normalized;
}

/**
 * Index of the row with `id` inside `scope`, or -1.
 */
export function findInScope(rows: readonly Transaction[], id: string, scope: Scope): number {
    return rows.findIndex((txn) => inScope(txn, scope) && sameId(txn.id, id));
}

/**
 * Append a row with a fresh id from its scope.
 */
export function appendTransaction(
    rows: readonly Transaction[],
    input: NormalizedInput,
    options: LedgerOptions
): MutationResult {
    const scope = scopeFor(options, input.user);
    const scopeIds = rows.filter((txn) => inScope(txn, scope)).map((txn) => txn.id);
    const id = nextFreeId(scopeIds, { policy: options.idPolicy, letterCase: options.idCase });

    const created: Transaction = { id, ...input, balance: '0.00' };
    const next = restampBalance([...rows, created], scope);

    return { rows: next, transaction: next[next.length - 1] };
}

/**
 * Replace the mutable fields of the row at `index`. Id and user stay.
 */
export function editTransaction(
    rows: readonly Transaction[],
    index: number,
    input: NormalizedInput,
    options: LedgerOptions
): MutationResult {
    const current = rows[index];
    if (!current) {
        throw new RangeError(`No row at index ${index}`);
    }

    const edited: Transaction = {
        ...current,
        date: input.date,
        category: input.category,
        subhead: input.subhead,
        debit: input.debit,
        credit: input.credit,
    };

    const replaced = rows.map((txn, i) => (i === index ? edited : txn));
    const next = restampBalance(replaced, scopeOf(current, options));

    return { rows: next, transaction: next[index] };
}

/**
 * Remove the row with `id` in `scope`. A missing id returns the rows unchanged.
 */
export function removeTransaction(
    rows: readonly Transaction[],
    id: string,
    scope: Scope
): RemovalResult {
    const index = findInScope(rows, id, scope);
    if (index === -1) {
        return { rows: [...rows], removed: null };
    }

    const removed = rows[index];
    const remaining = rows.filter((_, i) => i !== index);
    return { rows: restampBalance(remaining, scope), removed };
}

/**
 * Remove the last physical row, whatever scope it belongs to, and restamp
 * that scope. This reverts one row, not one operation: an edit is not undone.
 */
export function removeLast(rows: readonly Transaction[], options: LedgerOptions): RemovalResult {
    if (rows.length === 0) {
        return { rows: [], removed: null };
    }

    const removed = rows[rows.length - 1];
    const remaining = rows.slice(0, -1);
    return { rows: restampBalance(remaining, scopeOf(removed, options)), removed };
}
