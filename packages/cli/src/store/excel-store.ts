/**
 * Ledger store backed by an .xlsx workbook (sheet "Records").
 * Every save rewrites the whole workbook.
 */

import { existsSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import exceljs from 'exceljs';
import type { Workbook } from 'exceljs';
import {
    LEDGER_COLUMNS,
    RECORDS_SHEET,
    StoreUnavailableError,
    type LedgerColumn,
    type Transaction,
} from '@churchbooks/shared';
import { fromRecord, missingColumns, toRecord, type LedgerStore } from '@churchbooks/core';
import {
    amountCellValue,
    autoFitColumns,
    createWorkbook,
    formatCurrencyCell,
    formatHeaderRow,
    readCell,
} from '../excel/utils.js';

const AMOUNT_COLUMNS: readonly LedgerColumn[] = ['Debit', 'Credit', 'Balance'];

export class ExcelLedgerStore implements LedgerStore {
    constructor(readonly filePath: string) {}

    async load(): Promise<Transaction[]> {
        if (!existsSync(this.filePath)) {
            return [];
        }

        const workbook = new exceljs.Workbook();
        try {
            await workbook.xlsx.readFile(this.filePath);
        } catch (err) {
            throw new StoreUnavailableError(
                `Cannot read ledger workbook ${this.filePath}: ${(err as Error).message}`,
                { cause: err }
            );
        }
        return readLedgerWorkbook(workbook);
    }

    async save(rows: readonly Transaction[]): Promise<void> {
        await mkdir(dirname(this.filePath), { recursive: true });
        await buildLedgerWorkbook(rows).xlsx.writeFile(this.filePath);
    }
}

/**
 * Workbook with one "Records" sheet: canonical headers, amounts as numbers
 * where a double holds them exactly and as text otherwise.
 */
export function buildLedgerWorkbook(rows: readonly Transaction[]): Workbook {
    const workbook = createWorkbook();
    const sheet = workbook.addWorksheet(RECORDS_SHEET);
    sheet.columns = LEDGER_COLUMNS.map((header) => ({ header, key: header }));

    for (const txn of rows) {
        const record = toRecord(txn);
        sheet.addRow({
            ...record,
            Debit: amountCellValue(record.Debit),
            Credit: amountCellValue(record.Credit),
            Balance: amountCellValue(record.Balance),
            User: record.User || null,
        });
    }

    formatHeaderRow(sheet);
    for (const col of AMOUNT_COLUMNS) {
        formatCurrencyCell(sheet, col);
    }
    autoFitColumns(sheet);

    return workbook;
}

/**
 * Rows of the "Records" sheet, in sheet order. Blank rows are skipped.
 *
 * @throws StoreUnavailableError when the sheet or a required column is missing,
 *         or a row cannot be read
 */
export function readLedgerWorkbook(workbook: Workbook): Transaction[] {
    const sheet = workbook.getWorksheet(RECORDS_SHEET);
    if (!sheet) {
        throw new StoreUnavailableError(`Ledger workbook has no "${RECORDS_SHEET}" sheet`);
    }

    const headers: string[] = [];
    sheet.getRow(1).eachCell((cell, colNumber) => {
        headers[colNumber] = cell.text.trim();
    });

    const missing = missingColumns(headers.filter((h) => h !== undefined));
    if (missing.length > 0) {
        throw new StoreUnavailableError(`Ledger sheet is missing columns: ${missing.join(', ')}`);
    }

    const rows: Transaction[] = [];
    sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
        if (rowNumber === 1) return;

        const record: Record<string, unknown> = {};
        headers.forEach((header, colNumber) => {
            if (header) record[header] = readCell(row.getCell(colNumber));
        });
        rows.push(fromRecord(record, rowNumber - 1));
    });

    return rows;
}
