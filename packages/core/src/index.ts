// Types (re-exported from shared)
export type {
    Transaction,
    TransactionInput,
    ReportCriteria,
    ReportRow,
    TotalsRule,
    SummaryTotals,
    CategoryTotal,
    ExpenditureShare,
    RunningBalance,
    IdPolicy,
    IdCase,
    LedgerOptions,
    LedgerColumn,
} from './types/index.js';

export {
    TransactionSchema,
    LEDGER_ID,
    LEDGER_COLUMNS,
    DEFAULT_CATEGORIES,
    EXPENDITURE_CATEGORY,
    PRINT_LAYOUT,
    AMOUNT_SCALE,
    InvalidDateError,
    InvalidCategoryError,
    ExhaustedIdSpaceError,
    StoreUnavailableError,
    NotFoundError,
} from './types/index.js';

// Utils
export {
    nextId,
    nextFreeId,
    incrementLedgerId,
    parseLedgerId,
    formatLedgerId,
    baseLedgerId,
    sameId,
    parseDateValue,
    toIsoDate,
    formatIsoDate,
    parseAmount,
    formatAmount,
    normalizeAmount,
    sumAmounts,
    stripBom,
    cleanHeaders,
    cellText,
} from './utils/index.js';
export type { NextIdOptions } from './utils/index.js';

// Ledger
export {
    LedgerEngine,
    DEFAULT_LEDGER_OPTIONS,
    MemoryLedgerStore,
    computeBalance,
    restampBalance,
    validateBalances,
    scopeFor,
    inScope,
    toRecord,
    fromRecord,
    missingColumns,
} from './ledger/index.js';
export type {
    LedgerStore,
    LedgerQuery,
    AddOrEditResult,
    BalanceValidationResult,
    Scope,
    LedgerRecord,
} from './ledger/index.js';

// Reports
export {
    buildReport,
    filterTransactions,
    summarizeTotals,
    categoryTotals,
    expenditureShares,
    netAmounts,
    runningBalances,
    formatReportLine,
    paginateReport,
} from './report/index.js';
export type { TransactionFilter, TotalsOptions, PageLayout } from './report/index.js';
