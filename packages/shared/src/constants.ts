/**
 * Constants for Churchbooks.
 */

/**
 * Transaction identifier format: one letter followed by a 4-digit counter.
 */
export const LEDGER_ID = {
    BASE_LETTER: 'a',
    BASE_NUMBER: 1,
    DIGITS: 4,
    MAX_NUMBER: 9999,
    LAST_LETTER: 'z',
} as const;

/**
 * Column headers of the stored ledger table, in order.
 * `User` is only written for multi-user ledgers.
 */
export const LEDGER_COLUMNS = ['ID', 'Date', 'Category', 'Subhead', 'Debit', 'Credit', 'Balance', 'User'] as const;

export type LedgerColumn = (typeof LEDGER_COLUMNS)[number];

/**
 * Worksheet holding the ledger in the Excel backend.
 */
export const RECORDS_SHEET = 'Records';

/**
 * Category set used when the workspace config does not list one.
 */
export const DEFAULT_CATEGORIES = [
    'Weekly Collection',
    'Freewill Donation',
    'Fundraising',
    'Expenditure',
] as const;

export const EXPENDITURE_CATEGORY = 'Expenditure';

/**
 * Printable report layout on a letter page at 20pt line spacing. The title
 * block takes the top of the first page, so it holds fewer lines.
 */
export const PRINT_LAYOUT = {
    FIRST_PAGE_LINES: 33,
    LINES_PER_PAGE: 36,
    TITLE: 'Financial Report',
    RULE: '===================',
} as const;

/**
 * Money is kept as a decimal string with this many places.
 */
export const AMOUNT_SCALE = 2;
