import type { LedgerConfig } from '@churchbooks/shared';
import type { LedgerStore } from '@churchbooks/core';
import type { Workspace } from '../types.js';
import { getStorePath } from '../workspace/paths.js';
import { ExcelLedgerStore } from './excel-store.js';
import { CsvLedgerStore } from './csv-store.js';

/**
 * Picks the backend named in the workspace config.
 */
export function createLedgerStore(workspace: Workspace, config: LedgerConfig): LedgerStore {
    const path = getStorePath(workspace, config);
    switch (config.store.backend) {
        case 'excel':
            return new ExcelLedgerStore(path);
        case 'csv':
            return new CsvLedgerStore(path);
    }
}

export { ExcelLedgerStore, buildLedgerWorkbook, readLedgerWorkbook } from './excel-store.js';
export { CsvLedgerStore, formatLedgerCsv, parseLedgerCsv } from './csv-store.js';
