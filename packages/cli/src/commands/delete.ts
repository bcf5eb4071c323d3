import { openSession } from '../session.js';
import { success, warn } from '../utils/console.js';
import type { GlobalOptions } from '../types.js';

export async function deleteTransaction(id: string | undefined, options: GlobalOptions & { user?: string }): Promise<void> {
    if (!id) {
        throw new Error('Usage: churchbooks delete <id>');
    }

    const session = openSession(options.workspace);
    const removed = await session.engine.delete(id, options.user);

    if (removed) {
        success(`Transaction ${id} deleted.`);
    } else {
        warn(`No transaction ${id}; nothing deleted.`);
    }
}
