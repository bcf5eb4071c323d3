import { openSession } from '../session.js';
import { confirm } from '../utils/prompt.js';
import { success, warn, log } from '../utils/console.js';
import type { GlobalOptions } from '../types.js';

/**
 * `churchbooks undo`: drops the last row of the table, whoever entered it.
 */
export async function undoLast(options: GlobalOptions): Promise<void> {
    const session = openSession(options.workspace);

    const proceed = await confirm('Remove the last row of the ledger?', options);
    if (!proceed) {
        log('Undo cancelled.');
        return;
    }

    const removed = await session.engine.undoLast();
    if (!removed) {
        warn('Ledger is empty; nothing to undo.');
        return;
    }
    success(`Removed ${removed.id} (${removed.date}, ${removed.category}).`);
}
