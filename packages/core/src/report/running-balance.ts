import { Decimal } from 'decimal.js';
import type { RunningBalance, Transaction } from '../types/index.js';
import { formatAmount } from '../utils/amount.js';

/**
 * Cumulative credit - debit in date order. Rows sharing a date keep their
 * ledger order (Array.prototype.sort is stable).
 *
 * This is the per-row alternative to the snapshot `balance` stored on each
 * row; it is computed for display and never written back.
 */
export function runningBalances(rows: readonly Transaction[]): RunningBalance[] {
    const ordered = [...rows].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

    let running = new Decimal(0);
    return ordered.map((txn) => {
        running = running.plus(new Decimal(txn.credit)).minus(new Decimal(txn.debit));
        return { id: txn.id, date: txn.date, running_balance: formatAmount(running) };
    });
}
