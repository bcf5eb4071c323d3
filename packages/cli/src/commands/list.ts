import { filterTransactions, toIsoDate, validateBalances } from '@churchbooks/core';
import { flushWarnings, openSession } from '../session.js';
import { arrow, log, table, warn } from '../utils/console.js';
import type { FilterOptions } from '../types.js';

export async function listTransactions(options: FilterOptions): Promise<void> {
    const from = options.from ? toIsoDate(options.from) : undefined;
    const to = options.to ? toIsoDate(options.to) : undefined;

    const session = openSession(options.workspace);
    const multiUser = session.config.ledger.multi_user;

    // One read serves both the listing and the balance check.
    const scoped = await session.engine.list(options.user);
    flushWarnings(session);
    const check = validateBalances(scoped, { multiUser });

    const rows = filterTransactions(scoped, { from, to, category: options.category, subhead: options.subhead });
    if (rows.length === 0) {
        log('No transactions.');
    } else {
        const headers = ['ID', 'Date', 'Category', 'Subhead', 'Debit', 'Credit', 'Balance'];
        table(
            multiUser ? [...headers, 'User'] : headers,
            rows.map((txn) => {
                const cells = [txn.id, txn.date, txn.category, txn.subhead, txn.debit, txn.credit, txn.balance];
                return multiUser ? [...cells, txn.user ?? ''] : cells;
            })
        );
        arrow(`${rows.length} transaction(s)`);
    }

    if (!check.valid) {
        warn('Stored balances are out of date; they are restamped on the next change.');
    }
}
