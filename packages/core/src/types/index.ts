/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
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
} from '@churchbooks/shared';

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
} from '@churchbooks/shared';
