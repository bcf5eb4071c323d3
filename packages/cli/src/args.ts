import { parseArgs } from 'node:util';

const OPTIONS = {
    workspace: { type: 'string', short: 'w' },
    yes: { type: 'boolean', short: 'y' },
    help: { type: 'boolean', short: 'h' },
    id: { type: 'string' },
    date: { type: 'string' },
    category: { type: 'string' },
    subhead: { type: 'string' },
    debit: { type: 'string' },
    credit: { type: 'string' },
    user: { type: 'string' },
    from: { type: 'string' },
    to: { type: 'string' },
    csv: { type: 'string' },
    xlsx: { type: 'string' },
    pdf: { type: 'string' },
    organization: { type: 'string' },
} as const;

export interface CommandLine {
    command: string;
    args: string[];
    values: ReturnType<typeof parseOptions>['values'];
}

function parseOptions(argv: string[]) {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

/**
 * Splits argv (without the node and script entries) into a command,
 * its positional arguments and the option values.
 *
 * @throws TypeError for unknown options or a missing option value
 */
export function parseCommandLine(argv: string[]): CommandLine {
    const { values, positionals } = parseOptions(argv);
    const [command = 'help', ...args] = positionals;
    return { command: values.help ? 'help' : command, args, values };
}

export const USAGE = `
Churchbooks - church financial records

Usage:
  churchbooks <command> [options]

Commands:
  init                      Create config/ledger.yaml in the current directory
  add                       Record a transaction (edits it when --id matches)
      --date <date> --category <name> [--subhead <text>]
      [--debit <amount>] [--credit <amount>] [--user <name>] [--id <id>]
  delete <id> [--user]      Delete a transaction (no-op when absent)
  undo                      Remove the last row of the ledger
  list                      Show transactions
      [--from <date>] [--to <date>] [--category] [--subhead] [--user]
  report --from --to        Grouped totals per category and subhead
      [--category] [--subhead] [--user]
      [--csv <file>] [--xlsx <file>] [--pdf <file>]
  charts                    Category totals, expenditure breakdown, net amounts,
                            running balance
      [--from <date>] [--to <date>] [--category] [--subhead] [--user]

Options:
  --workspace, -w <dir>     Workspace root (default: search upwards for config/ledger.yaml)
  --yes, -y                 Skip confirmation prompts
  --help, -h                Show this help message
`.trim();
