/**
 * Conversion between ledger rows and flat table records keyed by the
 * canonical column headers. Used by every table-backed store.
 */

import type { LedgerColumn, Transaction } from '../types/index.js';
import { LEDGER_COLUMNS, StoreUnavailableError, TransactionSchema } from '../types/index.js';
import { parseDateValue, formatIsoDate } from '../utils/date-parse.js';
import { normalizeAmount, parseSignedAmount, formatAmount } from '../utils/amount.js';
import { cellText, cleanHeaders } from '../utils/csv.js';

export type LedgerRecord = Record<LedgerColumn, string>;

/**
 * Flatten a row into a record. Every column is present; a missing user is ''.
 */
export function toRecord(txn: Transaction): LedgerRecord {
    return {
        ID: txn.id,
        Date: txn.date,
        Category: txn.category,
        Subhead: txn.subhead,
        Debit: txn.debit,
        Credit: txn.credit,
        Balance: txn.balance,
        User: txn.user ?? '',
    };
}

/**
 * Rebuild a row from a table record.
 *
 * Amounts are normalized leniently. A row without a usable id, date or
 * category means the table is corrupt: rewriting it without that row would
 * lose data, so this throws instead of skipping.
 *
 * @param record - Cells keyed by header
 * @param rowNumber - 1-based data row number, for the error message
 * @throws StoreUnavailableError
 */
export function fromRecord(record: Record<string, unknown>, rowNumber: number): Transaction {
    const row = cleanHeaders(record);

    const date = parseDateValue(row['Date']);
    if (!date) {
        throw new StoreUnavailableError(`Row ${rowNumber}: invalid date "${cellText(row['Date'])}"`);
    }

    const user = cellText(row['User']);
    const candidate = {
        id: cellText(row['ID']),
        date: formatIsoDate(date),
        category: cellText(row['Category']),
        subhead: cellText(row['Subhead']),
        debit: normalizeAmount(row['Debit']),
        credit: normalizeAmount(row['Credit']),
        balance: formatAmount(parseSignedAmount(row['Balance'])),
        ...(user ? { user } : {}),
    };

    const parsed = TransactionSchema.safeParse(candidate);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new StoreUnavailableError(`Row ${rowNumber}: ${issues.join('; ')}`);
    }
    return parsed.data;
}

/**
 * Check a header row against the canonical columns.
 * `User` may be absent; the others are required.
 */
export function missingColumns(headers: readonly string[]): LedgerColumn[] {
    const present = new Set(headers.map((h) => h.trim()));
    return LEDGER_COLUMNS.filter((col) => col !== 'User' && !present.has(col));
}
