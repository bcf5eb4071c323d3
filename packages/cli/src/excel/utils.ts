import exceljs from 'exceljs';
import type { Cell, Worksheet, Workbook } from 'exceljs';
import { Decimal } from 'decimal.js';

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Churchbooks';
    workbook.created = new Date();
    return workbook;
}

/**
 * Bold white-on-blue header row, frozen in place.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = {
        bold: true,
        color: { argb: 'FFFFFFFF' },
        size: 11
    };

    headerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FF4472C4' }
    };

    headerRow.alignment = {
        vertical: 'middle',
        horizontal: 'center'
    };

    worksheet.views = [
        { state: 'frozen', xSplit: 0, ySplit: 1 }
    ];
}

/**
 * Attempts to auto-fit column widths based on cell content.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach(column => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, cell => {
            const len = cell.text.length;
            if (len > maxLen) maxLen = len;
        });
        column.width = Math.min(maxLen + 2, 100);
    });
}

/**
 * Two-place number format, negatives in red.
 */
export function formatCurrencyCell(worksheet: Worksheet, col: string | number): void {
    const column = worksheet.getColumn(col);
    column.numFmt = '#,##0.00;[Red]-#,##0.00';
    column.alignment = { horizontal: 'right' };
}

/**
 * Cell value for a decimal amount string. Amounts a double holds exactly are
 * written as numbers; larger ones are written as text so no cent is lost.
 */
export function amountCellValue(amount: string): number | string {
    const asNumber = Number(amount);
    return Number.isFinite(asNumber) && new Decimal(asNumber).equals(new Decimal(amount)) ? asNumber : amount;
}

/**
 * Plain value of a cell: strings, numbers and dates as-is, '' for empty,
 * and the displayed text for formulas, rich text and booleans.
 */
export function readCell(cell: Cell): unknown {
    const value = cell.value;
    if (value === null || value === undefined) return '';
    if (typeof value === 'string' || typeof value === 'number' || value instanceof Date) return value;
    return cell.text;
}
