import { categoryTotals, expenditureShares, netAmounts, runningBalances } from '@churchbooks/core';
import { flushWarnings, openSession } from '../session.js';
import { log, table, warn } from '../utils/console.js';
import type { FilterOptions } from '../types.js';

/**
 * `churchbooks charts`: the series behind the report charts, as text tables.
 */
export async function showCharts(options: FilterOptions): Promise<void> {
    const session = openSession(options.workspace);
    const rows = await session.engine.query({
        user: options.user,
        from: options.from,
        to: options.to,
        category: options.category,
        subhead: options.subhead,
    });
    flushWarnings(session);

    log('\nIncome vs. Expenditure by category');
    table(
        ['Category', 'Debit', 'Credit'],
        categoryTotals(rows).map((t) => [t.category, t.debit, t.credit])
    );

    log('\nExpenditure breakdown');
    const shares = expenditureShares(rows);
    if (shares.length === 0) {
        warn('No expenditure data available for this period.');
    } else {
        table(
            ['Category', 'Debit', 'Share'],
            shares.map((s) => [s.category, s.debit, `${s.percent}%`])
        );
    }

    log('\nNet amount per transaction');
    const nets = netAmounts(rows);
    table(
        ['ID', 'Date', 'Net'],
        rows.map((txn, i) => [txn.id, txn.date, nets[i]])
    );

    log('\nRunning balance');
    table(
        ['ID', 'Date', 'Balance'],
        runningBalances(rows).map((r) => [r.id, r.date, r.running_balance])
    );
}
