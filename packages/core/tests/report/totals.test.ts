import { describe, it, expect } from 'vitest';
import { summarizeTotals } from '../../src/report/totals.js';
import type { Transaction } from '@churchbooks/shared';

function makeTxn(overrides: Partial<Transaction>): Transaction {
    return {
        id: 'a0001',
        date: '2026-03-01',
        category: 'Fundraising',
        subhead: '',
        debit: '0.00',
        credit: '0.00',
        balance: '0.00',
        ...overrides,
    };
}

const rows = [
    makeTxn({ category: 'Weekly Collection', credit: '1200.00' }),
    makeTxn({ category: 'Fundraising', credit: '300.00', debit: '40.00' }), // event costs
    makeTxn({ category: 'Expenditure', debit: '500.00' }),
    makeTxn({ category: 'Expenditure', credit: '25.00' }), // supplier refund
];

describe('summarizeTotals', () => {
    it('sums the columns by default', () => {
        expect(summarizeTotals(rows)).toEqual({
            income: '1525.00',
            expenditure: '540.00',
            net: '985.00',
        });
    });

    it('splits by the expenditure category under the category rule', () => {
        expect(summarizeTotals(rows, { rule: 'category' })).toEqual({
            income: '1500.00',
            expenditure: '500.00',
            net: '1000.00',
        });
    });

    it('uses a configured expenditure category', () => {
        const totals = summarizeTotals(rows, { rule: 'category', expenditureCategory: 'Fundraising' });
        expect(totals).toEqual({ income: '1225.00', expenditure: '40.00', net: '1185.00' });
    });

    it('is all zero for no rows', () => {
        expect(summarizeTotals([])).toEqual({ income: '0.00', expenditure: '0.00', net: '0.00' });
    });

    it('goes negative when spending exceeds income', () => {
        expect(summarizeTotals([makeTxn({ debit: '10.50' })]).net).toBe('-10.50');
    });
});
