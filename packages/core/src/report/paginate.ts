import type { ReportRow } from '../types/index.js';
import { PRINT_LAYOUT } from '../types/index.js';

export interface PageLayout {
    /** Lines on the first page, under the title block. */
    firstPage?: number;
    /** Lines on every later page. */
    perPage?: number;
}

/**
 * One printed report line, e.g. "Expenditure - Utilities: Debit=500.00, Credit=0.00".
 */
export function formatReportLine(row: ReportRow): string {
    return `${row.category} - ${row.subhead}: Debit=${row.debit}, Credit=${row.credit}`;
}

/**
 * Split report lines into pages: `firstPage` lines on the first, `perPage`
 * on the rest. An empty report is one empty page, so a printed document
 * always has a page.
 */
export function paginateReport(rows: readonly ReportRow[], layout: PageLayout = {}): string[][] {
    const firstPage = checkPageSize('firstPage', layout.firstPage ?? PRINT_LAYOUT.FIRST_PAGE_LINES);
    const perPage = checkPageSize('perPage', layout.perPage ?? PRINT_LAYOUT.LINES_PER_PAGE);

    const lines = rows.map(formatReportLine);
    const pages: string[][] = [];
    let start = 0;
    while (start < lines.length) {
        const size = pages.length === 0 ? firstPage : perPage;
        pages.push(lines.slice(start, start + size));
        start += size;
    }
    return pages.length > 0 ? pages : [[]];
}

function checkPageSize(name: string, value: number): number {
    if (!Number.isInteger(value) || value < 1) {
        throw new RangeError(`${name} must be a positive integer, got ${value}`);
    }
    return value;
}
