import { describe, it, expect } from 'vitest';
import type { ReportRow } from '@churchbooks/shared';
import { toDelimitedText } from '../src/export/csv.js';
import { generateReportExcel } from '../src/excel/report.js';
import { generateReportPdf } from '../src/export/pdf.js';
import { paginateReport } from '@churchbooks/core';

const report: ReportRow[] = [
    { category: 'Expenditure', subhead: 'Utilities', debit: '500.00', credit: '0.00' },
    { category: 'Weekly Collection', subhead: 'Sunday', debit: '0.00', credit: '1200.00' },
];

describe('toDelimitedText', () => {
    it('writes one line per aggregate', () => {
        expect(toDelimitedText(report).trimEnd().split('\n')).toEqual([
            'Category,Subhead,Debit,Credit',
            'Expenditure,Utilities,500.00,0.00',
            'Weekly Collection,Sunday,0.00,1200.00',
        ]);
    });

    it('writes only the header for an empty report', () => {
        expect(toDelimitedText([]).trimEnd()).toBe('Category,Subhead,Debit,Credit');
    });
});

describe('generateReportExcel', () => {
    const totals = { income: '1200.00', expenditure: '500.00', net: '700.00' };

    it('adds a Report sheet with a TOTALS footer', async () => {
        const wb = await generateReportExcel(report, totals, { organization: 'St. Example Parish', from: '2026-03-01', to: '2026-03-31' });
        const sheet = wb.getWorksheet('Report');

        expect(sheet?.rowCount).toBe(4);
        expect(sheet?.getRow(2).getCell(1).value).toBe('Expenditure');
        expect(sheet?.getRow(2).getCell(3).value).toBe(500);
        expect(sheet?.getRow(4).getCell(1).value).toBe('TOTALS');
        expect(sheet?.getRow(4).getCell(3).value).toBe(500);
        expect(sheet?.getRow(4).getCell(4).value).toBe(1200);
    });

    it('writes amounts a double cannot hold as text', async () => {
        const large: ReportRow[] = [{ category: 'Fundraising', subhead: 'Bequest', debit: '0.00', credit: '90071992547409.93' }];
        const wb = await generateReportExcel(large, { income: '90071992547409.93', expenditure: '0.00', net: '90071992547409.93' }, {
            organization: 'St. Example Parish', from: '2026-03-01', to: '2026-03-31',
        });
        const sheet = wb.getWorksheet('Report');

        expect(sheet?.getRow(2).getCell(4).value).toBe('90071992547409.93');
        expect(sheet?.getRow(3).getCell(3).value).toBe(0);
        expect(sheet?.getRow(3).getCell(4).value).toBe('90071992547409.93');
        expect(wb.getWorksheet('Summary')?.getRow(6).getCell(2).value).toBe('90071992547409.93');
    });

    it('adds a Summary sheet with the period and totals', async () => {
        const wb = await generateReportExcel(report, totals, { organization: 'St. Example Parish', from: '2026-03-01', to: '2026-03-31' });
        const sheet = wb.getWorksheet('Summary');

        expect(sheet?.getRow(2).getCell(2).value).toBe('St. Example Parish');
        expect(sheet?.getRow(3).getCell(2).value).toBe('2026-03-01 to 2026-03-31');
        expect(sheet?.getRow(6).getCell(1).value).toBe('Net');
        expect(sheet?.getRow(6).getCell(2).value).toBe(700);
    });
});

describe('generateReportPdf', () => {
    const pageCount = (pdf: Buffer) => pdf.toString('latin1').match(/\/Type \/Page\b/g)?.length ?? 0;

    it('writes a PDF document', async () => {
        const pdf = await generateReportPdf([['Expenditure - Utilities: Debit=500.00, Credit=0.00']], 'St. Example Parish, March');
        expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    });

    it('writes one page per chunk of the paginated report', async () => {
        const rows: ReportRow[] = Array.from({ length: 40 }, (_, i) => ({
            category: 'Expenditure',
            subhead: `Item ${i + 1}`,
            debit: '1.00',
            credit: '0.00',
        }));
        const pages = paginateReport(rows);
        expect(pages.map((p) => p.length)).toEqual([33, 7]);

        expect(pageCount(await generateReportPdf(pages, 'St. Example Parish, March'))).toBe(2);
    });

    it('prints an empty report on a single page', async () => {
        expect(pageCount(await generateReportPdf(paginateReport([])))).toBe(1);
    });
});
