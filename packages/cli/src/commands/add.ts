import { openSession } from '../session.js';
import { success, arrow, warn } from '../utils/console.js';
import type { TransactionOptions } from '../types.js';

/**
 * `churchbooks add`: records a transaction, or edits one when --id matches.
 */
export async function addTransaction(options: TransactionOptions): Promise<void> {
    if (!options.date) {
        throw new Error('--date is required (YYYY-MM-DD or MM/DD/YYYY).');
    }
    if (!options.category) {
        throw new Error('--category is required.');
    }

    const session = openSession(options.workspace);
    const { action, transaction } = await session.engine.addOrEdit(options.id, {
        date: options.date,
        category: options.category,
        subhead: options.subhead,
        debit: options.debit,
        credit: options.credit,
        user: options.user,
    });

    if (action === 'edited') {
        success(`Transaction ${transaction.id} updated.`);
    } else {
        if (options.id) {
            warn(`No transaction ${options.id} to edit; recorded as a new transaction.`);
        }
        success(`Transaction ${transaction.id} added.`);
    }
    arrow(`${transaction.date}  ${transaction.category} / ${transaction.subhead || '-'}  debit ${transaction.debit}  credit ${transaction.credit}`);
    arrow(`Balance: ${transaction.balance}`);
}
