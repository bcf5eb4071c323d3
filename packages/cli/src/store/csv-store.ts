/**
 * Ledger store backed by a comma-separated text file with the canonical
 * header row. Cells are read as plain text and normalized by the row codec.
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import * as XLSX from 'xlsx';
import { LEDGER_COLUMNS, StoreUnavailableError, type Transaction } from '@churchbooks/shared';
import { cellText, fromRecord, missingColumns, stripBom, toRecord, type LedgerStore } from '@churchbooks/core';

export class CsvLedgerStore implements LedgerStore {
    constructor(readonly filePath: string) {}

    async load(): Promise<Transaction[]> {
        if (!existsSync(this.filePath)) {
            return [];
        }

        let content: string;
        try {
            content = await readFile(this.filePath, 'utf-8');
        } catch (err) {
            throw new StoreUnavailableError(
                `Cannot read ledger file ${this.filePath}: ${(err as Error).message}`,
                { cause: err }
            );
        }
        return parseLedgerCsv(content);
    }

    async save(rows: readonly Transaction[]): Promise<void> {
        await mkdir(dirname(this.filePath), { recursive: true });
        await writeFile(this.filePath, formatLedgerCsv(rows));
    }
}

/**
 * Header row plus one line per transaction, columns in canonical order.
 */
export function formatLedgerCsv(rows: readonly Transaction[]): string {
    const sheet = XLSX.utils.json_to_sheet(rows.map(toRecord), { header: [...LEDGER_COLUMNS] });
    return XLSX.utils.sheet_to_csv(sheet);
}

/**
 * @throws StoreUnavailableError when a required column is missing or a row is corrupt
 */
export function parseLedgerCsv(content: string): Transaction[] {
    const text = stripBom(content);
    if (text.trim() === '') {
        return [];
    }

    // raw: keep every cell as text so ids, dates and amounts are not reinterpreted
    const workbook = XLSX.read(text, { type: 'string', raw: true });
    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    if (!sheet) {
        return [];
    }

    const [headerRow = []] = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1 });
    const missing = missingColumns(headerRow.map(cellText));
    if (missing.length > 0) {
        throw new StoreUnavailableError(`Ledger file is missing columns: ${missing.join(', ')}`);
    }

    const records = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '' });
    return records.map((record, i) => fromRecord(record, i + 1));
}
