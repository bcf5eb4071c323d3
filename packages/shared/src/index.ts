// Schemas
export {
    TransactionSchema,
    ReportRowSchema,
    TotalsRuleSchema,
    SummaryTotalsSchema,
    CategoryTotalSchema,
    ExpenditureShareSchema,
    RunningBalanceSchema,
    IdPolicySchema,
    IdCaseSchema,
    StoreConfigSchema,
    LedgerConfigSchema,
} from './schemas.js';

// Types
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
    StoreConfig,
    LedgerConfig,
} from './schemas.js';

// Constants
export {
    LEDGER_ID,
    LEDGER_COLUMNS,
    RECORDS_SHEET,
    DEFAULT_CATEGORIES,
    EXPENDITURE_CATEGORY,
    PRINT_LAYOUT,
    AMOUNT_SCALE,
} from './constants.js';
export type { LedgerColumn } from './constants.js';

// Errors
export {
    LedgerError,
    InvalidDateError,
    InvalidCategoryError,
    ExhaustedIdSpaceError,
    StoreUnavailableError,
    NotFoundError,
    isLedgerError,
} from './errors.js';
export type { LedgerErrorCode } from './errors.js';
