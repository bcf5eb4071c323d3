import type { Transaction } from '../types/index.js';

/**
 * Row filter with already-parsed ISO dates. Both date bounds are inclusive.
 * Blank strings count as "no filter".
 */
export interface TransactionFilter {
    from?: string;
    to?: string;
    category?: string;
    subhead?: string;
}

/**
 * ISO YYYY-MM-DD strings compare correctly as plain strings.
 */
export function filterTransactions(rows: readonly Transaction[], filter: TransactionFilter): Transaction[] {
    const category = filter.category?.trim();
    const subhead = filter.subhead?.trim();

    return rows.filter((txn) => {
        if (filter.from && txn.date < filter.from) return false;
        if (filter.to && txn.date > filter.to) return false;
        if (category && txn.category !== category) return false;
        if (subhead && txn.subhead !== subhead) return false;
        return true;
    });
}
