/**
 * Dispatches a parsed command line to its command.
 */
import { USAGE, type CommandLine } from './args.js';
import { initWorkspace } from './commands/init.js';
import { addTransaction } from './commands/add.js';
import { deleteTransaction } from './commands/delete.js';
import { undoLast } from './commands/undo.js';
import { listTransactions } from './commands/list.js';
import { generateReport } from './commands/report.js';
import { showCharts } from './commands/charts.js';
import { isLedgerError } from '@churchbooks/shared';
import { log } from './utils/console.js';

export async function run(cli: CommandLine): Promise<void> {
    const { values } = cli;
    const global = { workspace: values.workspace, yes: values.yes === true };
    const filters = {
        ...global,
        user: values.user,
        from: values.from,
        to: values.to,
        category: values.category,
        subhead: values.subhead,
    };

    switch (cli.command) {
        case 'init':
            return initWorkspace({ directory: values.workspace ?? process.cwd(), organization: values.organization });
        case 'add':
            return addTransaction({
                ...global,
                id: values.id,
                date: values.date,
                category: values.category,
                subhead: values.subhead,
                debit: values.debit,
                credit: values.credit,
                user: values.user,
            });
        case 'delete':
            return deleteTransaction(cli.args[0], { ...global, user: values.user });
        case 'undo':
            return undoLast(global);
        case 'list':
            return listTransactions(filters);
        case 'report':
            return generateReport({ ...filters, csv: values.csv, xlsx: values.xlsx, pdf: values.pdf });
        case 'charts':
            return showCharts(filters);
        case 'help':
            log(USAGE);
            return;
        default:
            throw new Error(`Unknown command "${cli.command}". Run "churchbooks --help".`);
    }
}

/**
 * One-line message for a failed command. Ledger errors carry their code.
 */
export function formatError(err: unknown): string {
    if (isLedgerError(err)) {
        return `Error (${err.code}): ${err.message}`;
    }
    return `Error: ${err instanceof Error ? err.message : String(err)}`;
}
