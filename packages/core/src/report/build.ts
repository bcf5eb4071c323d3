import { Decimal } from 'decimal.js';
import type { ReportCriteria, ReportRow, Transaction } from '../types/index.js';
import { toIsoDate } from '../utils/date-parse.js';
import { formatAmount } from '../utils/amount.js';
import { filterTransactions } from './filter.js';

/**
 * Grouped report: rows dated within [startDate, endDate], optionally narrowed
 * to one category and/or subhead, summed per (category, subhead).
 *
 * Output is sorted by category, then subhead, in code-point order, so the
 * same ledger always yields the same report.
 *
 * @throws InvalidDateError when either bound is not a date
 */
export function buildReport(rows: readonly Transaction[], criteria: ReportCriteria): ReportRow[] {
    const from = toIsoDate(criteria.startDate);
    const to = toIsoDate(criteria.endDate);

    const filtered = filterTransactions(rows, {
        from,
        to,
        category: criteria.category,
        subhead: criteria.subhead,
    });

    const groups = new Map<string, { category: string; subhead: string; debit: Decimal; credit: Decimal }>();

    for (const txn of filtered) {
        // NUL never appears in a cell
        const key = `${txn.category}\u0000${txn.subhead}`;
        const group = groups.get(key) || {
            category: txn.category,
            subhead: txn.subhead,
            debit: new Decimal(0),
            credit: new Decimal(0),
        };
        group.debit = group.debit.plus(new Decimal(txn.debit));
        group.credit = group.credit.plus(new Decimal(txn.credit));
        groups.set(key, group);
    }

    return [...groups.values()]
        .sort((a, b) => compareText(a.category, b.category) || compareText(a.subhead, b.subhead))
        .map((group) => ({
            category: group.category,
            subhead: group.subhead,
            debit: formatAmount(group.debit),
            credit: formatAmount(group.credit),
        }));
}

export function compareText(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
