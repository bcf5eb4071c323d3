import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
    buildReport,
    filterTransactions,
    paginateReport,
    summarizeTotals,
    toIsoDate,
} from '@churchbooks/core';
import { flushWarnings, openSession } from '../session.js';
import { getOutputPath } from '../workspace/paths.js';
import { toDelimitedText } from '../export/csv.js';
import { generateReportExcel } from '../excel/report.js';
import { generateReportPdf } from '../export/pdf.js';
import { arrow, log, success, table } from '../utils/console.js';
import type { ReportOptions } from '../types.js';

/**
 * `churchbooks report`: grouped debit/credit per category and subhead for a
 * date range, with income/expenditure totals, optionally exported.
 */
export async function generateReport(options: ReportOptions): Promise<void> {
    if (!options.from || !options.to) {
        throw new Error('--from and --to are required (YYYY-MM-DD).');
    }
    const from = toIsoDate(options.from);
    const to = toIsoDate(options.to);

    const session = openSession(options.workspace);
    const { config, workspace } = session;

    const rows = await session.engine.list(options.user);
    flushWarnings(session);

    const report = buildReport(rows, {
        startDate: from,
        endDate: to,
        category: options.category,
        subhead: options.subhead,
    });
    const totals = summarizeTotals(
        filterTransactions(rows, { from, to, category: options.category, subhead: options.subhead }),
        { rule: config.reports.totals_rule, expenditureCategory: config.reports.expenditure_category }
    );

    log(`\n${config.organization} - Financial Report ${from} to ${to}\n`);
    if (report.length === 0) {
        log('No transactions in this period.');
    } else {
        table(
            ['Category', 'Subhead', 'Debit', 'Credit'],
            report.map((row) => [row.category, row.subhead, row.debit, row.credit])
        );
    }
    log('');
    arrow(`Total income:      ${totals.income}`);
    arrow(`Total expenditure: ${totals.expenditure}`);
    arrow(`Net:               ${totals.net}`);

    if (options.csv) {
        const path = getOutputPath(workspace, options.csv);
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, toDelimitedText(report), 'utf-8');
        success(`CSV saved to: ${path}`);
    }

    if (options.xlsx) {
        const path = getOutputPath(workspace, options.xlsx);
        await mkdir(dirname(path), { recursive: true });
        const workbook = await generateReportExcel(report, totals, { organization: config.organization, from, to });
        await workbook.xlsx.writeFile(path);
        success(`Workbook saved to: ${path}`);
    }

    if (options.pdf) {
        const path = getOutputPath(workspace, options.pdf);
        await mkdir(dirname(path), { recursive: true });
        const pages = paginateReport(report, {
            firstPage: config.reports.first_page_lines,
            perPage: config.reports.lines_per_page,
        });
        await writeFile(path, await generateReportPdf(pages, `${config.organization}, ${from} to ${to}`));
        success(`PDF saved to: ${path} (${pages.length} page(s))`);
    }
}
