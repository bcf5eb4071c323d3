/**
 * Zod schemas for Churchbooks data structures.
 *
 * IMPORTANT: Money is stored as decimal strings in schemas.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import { DEFAULT_CATEGORIES, EXPENDITURE_CATEGORY, LEDGER_ID, PRINT_LAYOUT } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Decimal amount as string (never native number for money).
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

/**
 * Non-negative decimal amount (debit/credit columns).
 */
const amountString = z.string().regex(/^\d+(\.\d+)?$/, 'Must be a non-negative decimal string');

/**
 * Ledger ID: one letter and a zero-padded counter, e.g. "a0001".
 */
const ledgerId = z.string().regex(
    new RegExp(`^[a-zA-Z]\\d{${LEDGER_ID.DIGITS}}$`),
    `Must be a letter followed by ${LEDGER_ID.DIGITS} digits`
);

// ============================================================================
// Transaction Schema
// ============================================================================

/**
 * One ledger row as stored.
 * `balance` is the snapshot balance of the row's scope, never set directly.
 */
export const TransactionSchema = z.object({
    id: ledgerId,
    date: isoDateString,
    category: z.string().min(1),
    subhead: z.string(),
    debit: amountString,
    credit: amountString,
    balance: decimalString,
    user: z.string().min(1).optional(),
});

export type Transaction = z.infer<typeof TransactionSchema>;

/**
 * Operator input for add/edit. Values arrive raw from the CLI or a spreadsheet
 * cell and are normalized by the engine.
 */
export interface TransactionInput {
    date: unknown;
    category: string;
    subhead?: string;
    debit?: unknown;
    credit?: unknown;
    user?: string;
}

// ============================================================================
// Report Schemas
// ============================================================================

/**
 * Report filter. Dates arrive raw and are parsed by the report builder;
 * blank category/subhead filters count as absent.
 */
export interface ReportCriteria {
    startDate: unknown;
    endDate: unknown;
    category?: string;
    subhead?: string;
}

/**
 * One aggregate line: debit and credit summed per (category, subhead).
 */
export const ReportRowSchema = z.object({
    category: z.string(),
    subhead: z.string(),
    debit: amountString,
    credit: amountString,
});

export type ReportRow = z.infer<typeof ReportRowSchema>;

export const TotalsRuleSchema = z.enum(['columns', 'category']);

export type TotalsRule = z.infer<typeof TotalsRuleSchema>;

export const SummaryTotalsSchema = z.object({
    income: amountString,
    expenditure: amountString,
    net: decimalString,
});

export type SummaryTotals = z.infer<typeof SummaryTotalsSchema>;

export const CategoryTotalSchema = z.object({
    category: z.string(),
    debit: amountString,
    credit: amountString,
});

export type CategoryTotal = z.infer<typeof CategoryTotalSchema>;

export const ExpenditureShareSchema = z.object({
    category: z.string(),
    debit: amountString,
    percent: z.string(),
});

export type ExpenditureShare = z.infer<typeof ExpenditureShareSchema>;

export const RunningBalanceSchema = z.object({
    id: ledgerId,
    date: isoDateString,
    running_balance: decimalString,
});

export type RunningBalance = z.infer<typeof RunningBalanceSchema>;

// ============================================================================
// Ledger Options
// ============================================================================

export const IdPolicySchema = z.enum(['last', 'max']);

export type IdPolicy = z.infer<typeof IdPolicySchema>;

export const IdCaseSchema = z.enum(['lower', 'upper']);

export type IdCase = z.infer<typeof IdCaseSchema>;

export interface LedgerOptions {
    multiUser: boolean;
    idPolicy: IdPolicy;
    idCase: IdCase;
    categories: readonly string[];
}

// ============================================================================
// Workspace Configuration (config/ledger.yaml)
// ============================================================================

export const StoreConfigSchema = z.object({
    backend: z.enum(['excel', 'csv']).default('excel'),
    path: z.string().min(1).default('data/financial_records.xlsx'),
});

export type StoreConfig = z.infer<typeof StoreConfigSchema>;

export const LedgerConfigSchema = z.object({
    organization: z.string().default('Organization'),
    store: StoreConfigSchema.default({}),
    ledger: z.object({
        multi_user: z.boolean().default(false),
        id_policy: IdPolicySchema.default('last'),
        id_case: IdCaseSchema.default('lower'),
    }).default({}),
    categories: z.array(z.string().min(1)).default([...DEFAULT_CATEGORIES]),
    reports: z.object({
        totals_rule: TotalsRuleSchema.default('columns'),
        expenditure_category: z.string().min(1).default(EXPENDITURE_CATEGORY),
        first_page_lines: z.number().int().min(1).default(PRINT_LAYOUT.FIRST_PAGE_LINES),
        lines_per_page: z.number().int().min(1).default(PRINT_LAYOUT.LINES_PER_PAGE),
    }).default({}),
});

export type LedgerConfig = z.infer<typeof LedgerConfigSchema>;
