import * as XLSX from 'xlsx';
import type { ReportRow } from '@churchbooks/shared';

export const REPORT_CSV_HEADER = ['Category', 'Subhead', 'Debit', 'Credit'] as const;

/**
 * Grouped report as comma-separated text, one line per (category, subhead).
 */
export function toDelimitedText(rows: readonly ReportRow[]): string {
    const sheet = XLSX.utils.json_to_sheet(
        rows.map((row) => ({
            Category: row.category,
            Subhead: row.subhead,
            Debit: row.debit,
            Credit: row.credit,
        })),
        { header: [...REPORT_CSV_HEADER] }
    );
    return XLSX.utils.sheet_to_csv(sheet);
}
