/**
 * Ledger module: mutations, snapshot balances, the store port and the engine.
 */

export { LedgerEngine, DEFAULT_LEDGER_OPTIONS } from './engine.js';
export type { LedgerQuery, AddOrEditResult } from './engine.js';
export { MemoryLedgerStore } from './store.js';
export type { LedgerStore } from './store.js';
export {
    normalizeInput,
    appendTransaction,
    editTransaction,
    removeTransaction,
    removeLast,
    findInScope,
} from './mutate.js';
export type { NormalizedInput, MutationResult, RemovalResult } from './mutate.js';
export { computeBalance, restampBalance, validateBalances } from './balance.js';
export type { BalanceValidationResult } from './balance.js';
export { scopeFor, scopeOf, inScope, normalizeUser } from './scope.js';
export type { Scope } from './scope.js';
export { toRecord, fromRecord, missingColumns } from './records.js';
export type { LedgerRecord } from './records.js';
