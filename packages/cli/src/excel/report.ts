import type { Workbook } from 'exceljs';
import type { ReportRow, SummaryTotals } from '@churchbooks/shared';
import { formatAmount, sumAmounts } from '@churchbooks/core';
import { createWorkbook, formatHeaderRow, autoFitColumns, formatCurrencyCell, amountCellValue } from './utils.js';

export interface ReportMeta {
    organization: string;
    from: string;
    to: string;
}

/**
 * Report workbook with two sheets:
 *   - Report:  category, subhead, debit, credit, with a TOTALS footer
 *   - Summary: income, expenditure, net and the period covered
 */
export async function generateReportExcel(
    rows: readonly ReportRow[],
    totals: SummaryTotals,
    meta: ReportMeta
): Promise<Workbook> {
    const workbook = createWorkbook();

    addReportSheet(workbook, rows);
    addSummarySheet(workbook, totals, meta);

    return workbook;
}

function addReportSheet(workbook: Workbook, rows: readonly ReportRow[]): void {
    const sheet = workbook.addWorksheet('Report');
    sheet.columns = [
        { header: 'Category', key: 'category' },
        { header: 'Subhead', key: 'subhead' },
        { header: 'Debit', key: 'debit' },
        { header: 'Credit', key: 'credit' },
    ];

    for (const row of rows) {
        sheet.addRow({
            category: row.category,
            subhead: row.subhead,
            debit: amountCellValue(row.debit),
            credit: amountCellValue(row.credit),
        });
    }

    const footerRow = sheet.addRow({
        category: 'TOTALS',
        debit: amountCellValue(formatAmount(sumAmounts(rows.map((row) => row.debit)))),
        credit: amountCellValue(formatAmount(sumAmounts(rows.map((row) => row.credit)))),
    });
    footerRow.font = { bold: true };
    footerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FFE0E0E0' }
    };

    formatHeaderRow(sheet);
    formatCurrencyCell(sheet, 'debit');
    formatCurrencyCell(sheet, 'credit');
    autoFitColumns(sheet);
}

function addSummarySheet(workbook: Workbook, totals: SummaryTotals, meta: ReportMeta): void {
    const sheet = workbook.addWorksheet('Summary');
    sheet.columns = [
        { header: 'Metric', key: 'metric' },
        { header: 'Value', key: 'value' },
    ];

    sheet.addRow({ metric: 'Organization', value: meta.organization });
    sheet.addRow({ metric: 'Period', value: `${meta.from} to ${meta.to}` });
    sheet.addRow({ metric: 'Total income', value: amountCellValue(totals.income) });
    sheet.addRow({ metric: 'Total expenditure', value: amountCellValue(totals.expenditure) });
    sheet.addRow({ metric: 'Net', value: amountCellValue(totals.net) });

    formatHeaderRow(sheet);
    formatCurrencyCell(sheet, 'value');
    autoFitColumns(sheet);
}
