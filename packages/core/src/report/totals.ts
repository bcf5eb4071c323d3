import { Decimal } from 'decimal.js';
import type { SummaryTotals, TotalsRule, Transaction } from '../types/index.js';
import { EXPENDITURE_CATEGORY } from '../types/index.js';
import { formatAmount } from '../utils/amount.js';

export interface TotalsOptions {
    rule?: TotalsRule;
    expenditureCategory?: string;
}

/**
 * Income, expenditure and net over a set of rows.
 *
 * Rules:
 *   - 'columns' (default): income = all credit, expenditure = all debit.
 *     Net equals the snapshot balance of the same rows.
 *   - 'category': income = credit of rows outside the expenditure category,
 *     expenditure = debit of rows in it. Debit on an income row and credit on
 *     an expenditure row are left out, so net can differ from the balance.
 */
export function summarizeTotals(rows: readonly Transaction[], options: TotalsOptions = {}): SummaryTotals {
    const { rule = 'columns', expenditureCategory = EXPENDITURE_CATEGORY } = options;

    let income = new Decimal(0);
    let expenditure = new Decimal(0);

    for (const txn of rows) {
        if (rule === 'columns') {
            income = income.plus(new Decimal(txn.credit));
            expenditure = expenditure.plus(new Decimal(txn.debit));
        } else if (txn.category === expenditureCategory) {
            expenditure = expenditure.plus(new Decimal(txn.debit));
        } else {
            income = income.plus(new Decimal(txn.credit));
        }
    }

    return {
        income: formatAmount(income),
        expenditure: formatAmount(expenditure),
        net: formatAmount(income.minus(expenditure)),
    };
}
