#!/usr/bin/env node
/**
 * Churchbooks CLI
 *
 * The CLI owns all file I/O and console output; @churchbooks/core receives
 * rows through the LedgerStore port and returns data and warnings.
 */

import { parseCommandLine } from './args.js';
import { formatError, run } from './run.js';
import { error } from './utils/console.js';

async function main() {
    const cli = parseCommandLine(process.argv.slice(2));
    await run(cli);
}

main().catch((err) => {
    error(formatError(err));
    process.exit(1);
});
