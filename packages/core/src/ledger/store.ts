import type { Transaction } from '../types/index.js';

/**
 * Persistence port for the ledger: the whole table in, the whole table out.
 *
 * `load` returns rows in stored order. A backing table that does not exist
 * yet loads as an empty ledger. A table that exists but cannot be read
 * rejects with StoreUnavailableError.
 */
export interface LedgerStore {
    load(): Promise<Transaction[]>;
    save(rows: readonly Transaction[]): Promise<void>;
}

/**
 * In-process store. Holds copies so callers cannot alter saved rows.
 */
export class MemoryLedgerStore implements LedgerStore {
    private rows: Transaction[];
    saveCount = 0;

    constructor(rows: readonly Transaction[] = []) {
        this.rows = rows.map((txn) => ({ ...txn }));
    }

    async load(): Promise<Transaction[]> {
        return this.rows.map((txn) => ({ ...txn }));
    }

    async save(rows: readonly Transaction[]): Promise<void> {
        this.rows = rows.map((txn) => ({ ...txn }));
        this.saveCount++;
    }
}
