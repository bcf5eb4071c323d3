import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InvalidDateError } from '@churchbooks/shared';
import { initWorkspace } from '../src/commands/init.js';
import { addTransaction } from '../src/commands/add.js';
import { deleteTransaction } from '../src/commands/delete.js';
import { undoLast } from '../src/commands/undo.js';
import { listTransactions } from '../src/commands/list.js';
import { generateReport } from '../src/commands/report.js';
import { showCharts } from '../src/commands/charts.js';
import { openSession } from '../src/session.js';
import { ExcelLedgerStore } from '../src/store/excel-store.js';

describe('commands against a workspace', () => {
    let dir: string;
    let log: MockInstance<typeof console.log>;
    let warn: MockInstance<typeof console.warn>;

    const ledger = () => new ExcelLedgerStore(join(dir, 'data', 'financial_records.xlsx')).load();

    async function seed() {
        await addTransaction({ workspace: dir, yes: true, date: '2026-03-01', category: 'Weekly Collection', subhead: 'Sunday', credit: '1200' });
        await addTransaction({ workspace: dir, yes: true, date: '03/05/2026', category: 'Expenditure', subhead: 'Utilities', debit: '500' });
        await addTransaction({ workspace: dir, yes: true, date: '2026-04-02', category: 'Fundraising', subhead: 'Bazaar', credit: '80' });
    }

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'churchbooks-cmd-'));
        log = vi.spyOn(console, 'log').mockImplementation(() => {});
        warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
        await initWorkspace({ directory: dir, organization: 'St. Example Parish' });
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(dir, { recursive: true, force: true });
    });

    it('init writes the config', () => {
        expect(existsSync(join(dir, 'config', 'ledger.yaml'))).toBe(true);
        expect(openSession(dir).config.organization).toBe('St. Example Parish');
    });

    it('add records transactions with running ids and balance', async () => {
        await seed();

        expect(log).toHaveBeenCalledWith('✓ Transaction a0002 added.');
        expect(log).toHaveBeenCalledWith('→ 2026-03-05  Expenditure / Utilities  debit 500.00  credit 0.00');
        expect(log).toHaveBeenCalledWith('→ Balance: 780.00');

        const rows = await ledger();
        expect(rows.map((t) => [t.id, t.balance])).toEqual([
            ['a0001', '780.00'],
            ['a0002', '780.00'],
            ['a0003', '780.00'],
        ]);
    });

    it('add edits when the id matches and warns when it does not', async () => {
        await seed();

        await addTransaction({ workspace: dir, yes: true, id: 'a0002', date: '2026-03-05', category: 'Expenditure', subhead: 'Utilities', debit: '450' });
        expect(log).toHaveBeenCalledWith('✓ Transaction a0002 updated.');

        await addTransaction({ workspace: dir, yes: true, id: 'z0001', date: '2026-04-05', category: 'Freewill Donation', credit: '20' });
        expect(warn).toHaveBeenCalledWith('⚠️  No transaction z0001 to edit; recorded as a new transaction.');
        expect(log).toHaveBeenCalledWith('✓ Transaction a0004 added.');

        expect((await ledger()).map((t) => t.balance)).toEqual(['850.00', '850.00', '850.00', '850.00']);
    });

    it('add requires a date and category and rejects a bad date', async () => {
        await expect(addTransaction({ workspace: dir, yes: true, category: 'Fundraising' }))
            .rejects.toThrow('--date is required (YYYY-MM-DD or MM/DD/YYYY).');
        await expect(addTransaction({ workspace: dir, yes: true, date: '2026-03-01' }))
            .rejects.toThrow('--category is required.');
        await expect(addTransaction({ workspace: dir, yes: true, date: '31/03/2026', category: 'Fundraising' }))
            .rejects.toThrow(InvalidDateError);
        expect(await ledger()).toEqual([]);
    });

    it('delete removes a row and ignores a missing id', async () => {
        await seed();

        await deleteTransaction('a0009', { workspace: dir, yes: true });
        expect(warn).toHaveBeenCalledWith('⚠️  No transaction a0009; nothing deleted.');
        expect(await ledger()).toHaveLength(3);

        await deleteTransaction('a0002', { workspace: dir, yes: true });
        expect(log).toHaveBeenCalledWith('✓ Transaction a0002 deleted.');
        expect((await ledger()).map((t) => [t.id, t.balance])).toEqual([
            ['a0001', '1280.00'],
            ['a0003', '1280.00'],
        ]);
    });

    it('undo removes the last row once confirmed', async () => {
        await seed();

        const isTTY = process.stdin.isTTY;
        process.stdin.isTTY = false;
        try {
            await undoLast({ workspace: dir, yes: false });
        } finally {
            process.stdin.isTTY = isTTY;
        }
        expect(log).toHaveBeenCalledWith('Undo cancelled.');
        expect(await ledger()).toHaveLength(3);

        await undoLast({ workspace: dir, yes: true });
        expect(log).toHaveBeenCalledWith('✓ Removed a0003 (2026-04-02, Fundraising).');
        expect((await ledger()).map((t) => t.balance)).toEqual(['700.00', '700.00']);
    });

    it('undo on an empty ledger warns', async () => {
        await undoLast({ workspace: dir, yes: true });
        expect(warn).toHaveBeenCalledWith('⚠️  Ledger is empty; nothing to undo.');
    });

    it('list prints the filtered rows', async () => {
        await seed();

        await listTransactions({ workspace: dir, yes: true, category: 'Expenditure' });
        expect(log).toHaveBeenCalledWith('a0002  2026-03-05  Expenditure  Utilities  500.00    0.00   780.00');
        expect(log).toHaveBeenCalledWith('→ 1 transaction(s)');
        expect(warn).not.toHaveBeenCalled();
    });

    it('list flags stale balances even when the filter matches nothing', async () => {
        await new ExcelLedgerStore(join(dir, 'data', 'financial_records.xlsx')).save([{
            id: 'a0001', date: '2026-03-01', category: 'Fundraising', subhead: '',
            debit: '0.00', credit: '80.00', balance: '0.00',
        }]);

        await listTransactions({ workspace: dir, yes: true, category: 'Expenditure' });
        expect(log).toHaveBeenCalledWith('No transactions.');
        expect(warn).toHaveBeenCalledWith('⚠️  Stored balances are out of date; they are restamped on the next change.');
    });

    it('list reports an unreadable ledger once', async () => {
        await mkdir(join(dir, 'data'));
        await writeFile(join(dir, 'data', 'financial_records.xlsx'), 'not a workbook');

        await listTransactions({ workspace: dir, yes: true });
        expect(log).toHaveBeenCalledWith('No transactions.');
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^⚠️ {2}Cannot read ledger workbook .+\. Showing an empty ledger\.$/));
    });

    it('report prints totals and writes the exports', async () => {
        await seed();

        await generateReport({
            workspace: dir,
            yes: true,
            from: '2026-03-01',
            to: '2026-03-31',
            csv: 'march.csv',
            pdf: 'march.pdf',
        });

        expect(log).toHaveBeenCalledWith('\nSt. Example Parish - Financial Report 2026-03-01 to 2026-03-31\n');
        expect(log).toHaveBeenCalledWith('→ Total income:      1200.00');
        expect(log).toHaveBeenCalledWith('→ Total expenditure: 500.00');
        expect(log).toHaveBeenCalledWith('→ Net:               700.00');

        const csv = await readFile(join(dir, 'outputs', 'march.csv'), 'utf-8');
        expect(csv.trimEnd().split('\n')).toEqual([
            'Category,Subhead,Debit,Credit',
            'Expenditure,Utilities,500.00,0.00',
            'Weekly Collection,Sunday,0.00,1200.00',
        ]);

        const pdfPath = join(dir, 'outputs', 'march.pdf');
        expect((await readFile(pdfPath)).subarray(0, 5).toString('latin1')).toBe('%PDF-');
        expect(log).toHaveBeenCalledWith(`✓ PDF saved to: ${pdfPath} (1 page(s))`);
    });

    it('report requires both bounds', async () => {
        await expect(generateReport({ workspace: dir, yes: true, from: '2026-03-01' }))
            .rejects.toThrow('--from and --to are required (YYYY-MM-DD).');
    });

    it('charts warns when there is no expenditure', async () => {
        await addTransaction({ workspace: dir, yes: true, date: '2026-03-01', category: 'Fundraising', credit: '80' });

        await showCharts({ workspace: dir, yes: true });
        expect(log).toHaveBeenCalledWith('\nIncome vs. Expenditure by category');
        expect(warn).toHaveBeenCalledWith('⚠️  No expenditure data available for this period.');
    });

    it('charts follow the category filter and list net amounts', async () => {
        await addTransaction({ workspace: dir, yes: true, date: '2026-03-01', category: 'Fundraising', credit: '80' });
        await addTransaction({ workspace: dir, yes: true, date: '2026-03-02', category: 'Expenditure', debit: '30' });
        await addTransaction({ workspace: dir, yes: true, date: '2026-03-03', category: 'Expenditure', debit: '20' });
        log.mockClear();

        await showCharts({ workspace: dir, yes: true, category: 'Expenditure' });

        expect(log).toHaveBeenCalledWith('Expenditure  50.00    0.00');
        expect(log).toHaveBeenCalledWith('\nNet amount per transaction');
        expect(log).toHaveBeenCalledWith('a0003  2026-03-03  -20.00');
        expect(log).toHaveBeenCalledWith('a0003  2026-03-03   -50.00');
        expect(log.mock.calls.some(([line]) => String(line).startsWith('Fundraising'))).toBe(false);
    });

    it('fails outside a workspace', async () => {
        const outside = await mkdtemp(join(tmpdir(), 'churchbooks-none-'));
        vi.spyOn(process, 'cwd').mockReturnValue(outside);
        try {
            expect(() => openSession()).toThrow('Workspace not found. Run "churchbooks init" or pass --workspace <dir>.');
        } finally {
            await rm(outside, { recursive: true, force: true });
        }
    });
});
