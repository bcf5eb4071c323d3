/**
 * Ledger engine: every operation is a full load, a pure mutation from
 * ./mutate.ts, and a full save. There is no in-memory cache between calls;
 * two engines writing the same store race and the later save wins.
 */

import type { LedgerOptions, Transaction, TransactionInput } from '../types/index.js';
import { DEFAULT_CATEGORIES, NotFoundError, StoreUnavailableError } from '../types/index.js';
import { toIsoDate } from '../utils/date-parse.js';
import { filterTransactions } from '../report/filter.js';
import type { LedgerStore } from './store.js';
import { inScope, scopeFor } from './scope.js';
import {
    appendTransaction,
    editTransaction,
    findInScope,
    normalizeInput,
    removeLast,
    removeTransaction,
} from './mutate.js';

export const DEFAULT_LEDGER_OPTIONS: LedgerOptions = {
    multiUser: false,
    idPolicy: 'last',
    idCase: 'lower',
    categories: DEFAULT_CATEGORIES,
};

/**
 * Read filter. Dates arrive raw and are parsed here; blank values are ignored.
 */
export interface LedgerQuery {
    user?: string;
    from?: unknown;
    to?: unknown;
    category?: string;
    subhead?: string;
}

export interface AddOrEditResult {
    action: 'added' | 'edited';
    transaction: Transaction;
}

export class LedgerEngine {
    readonly options: LedgerOptions;

    /** Conditions a read degraded over, for the caller to report. */
    readonly warnings: string[] = [];

    constructor(
        private readonly store: LedgerStore,
        options: Partial<LedgerOptions> = {}
    ) {
        this.options = { ...DEFAULT_LEDGER_OPTIONS, ...options };
    }

    /**
     * All rows, or one user's rows in multi-user mode when `user` is given.
     */
    async list(user?: string): Promise<Transaction[]> {
        const rows = await this.loadForRead();
        if (!this.options.multiUser || user === undefined) {
            return rows;
        }
        const scope = scopeFor(this.options, user);
        return rows.filter((txn) => inScope(txn, scope));
    }

    /**
     * @throws NotFoundError when no row in the scope has this id
     */
    async get(id: string, user?: string): Promise<Transaction> {
        const rows = await this.loadForRead();
        const index = findInScope(rows, id.trim(), scopeFor(this.options, user));
        if (index === -1) {
            throw new NotFoundError(id, this.options.multiUser ? user : undefined);
        }
        return rows[index];
    }

    /**
     * @throws InvalidDateError when a given date bound is not a date
     */
    async query(query: LedgerQuery): Promise<Transaction[]> {
        const from = isBlank(query.from) ? undefined : toIsoDate(query.from);
        const to = isBlank(query.to) ? undefined : toIsoDate(query.to);
        const rows = await this.list(query.user);
        return filterTransactions(rows, { from, to, category: query.category, subhead: query.subhead });
    }

    /**
     * Append a transaction with a freshly generated id.
     *
     * @throws InvalidDateError, InvalidCategoryError before anything is loaded
     * @throws ExhaustedIdSpaceError when the scope has used z9999
     */
    async add(input: TransactionInput): Promise<Transaction> {
        const normalized = normalizeInput(input, this.options);
        const rows = await this.store.load();
        const result = appendTransaction(rows, normalized, this.options);
        await this.store.save(result.rows);
        return result.transaction;
    }

    /**
     * Edit the row with `idOrBlank` when it exists in the input's scope,
     * otherwise add a new row. A supplied id that matches nothing is ignored.
     */
    async addOrEdit(idOrBlank: string | undefined, input: TransactionInput): Promise<AddOrEditResult> {
        const normalized = normalizeInput(input, this.options);
        const rows = await this.store.load();

        const id = idOrBlank?.trim() ?? '';
        const index = id === '' ? -1 : findInScope(rows, id, scopeFor(this.options, normalized.user));

        if (index === -1) {
            const result = appendTransaction(rows, normalized, this.options);
            await this.store.save(result.rows);
            return { action: 'added', transaction: result.transaction };
        }

        const result = editTransaction(rows, index, normalized, this.options);
        await this.store.save(result.rows);
        return { action: 'edited', transaction: result.transaction };
    }

    /**
     * Remove a row. Returns false, and saves nothing, when the id is absent.
     */
    async delete(id: string, user?: string): Promise<boolean> {
        const rows = await this.store.load();
        const result = removeTransaction(rows, id.trim(), scopeFor(this.options, user));
        if (!result.removed) {
            return false;
        }
        await this.store.save(result.rows);
        return true;
    }

    /**
     * Remove the last physical row across all scopes. Returns the removed row,
     * or null on an empty ledger (nothing is saved).
     */
    async undoLast(): Promise<Transaction | null> {
        const rows = await this.store.load();
        const result = removeLast(rows, this.options);
        if (!result.removed) {
            return null;
        }
        await this.store.save(result.rows);
        return result.removed;
    }

    /**
     * Reads survive an unreadable table by showing an empty ledger.
     * Mutations load through the store directly so they never overwrite it.
     */
    private async loadForRead(): Promise<Transaction[]> {
        try {
            return await this.store.load();
        } catch (err) {
            if (err instanceof StoreUnavailableError) {
                this.warnings.push(`${err.message}. Showing an empty ledger.`);
                return [];
            }
            throw err;
        }
    }
}

function isBlank(value: unknown): boolean {
    return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}
