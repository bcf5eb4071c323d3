/**
 * Report module: filtering, grouped aggregates, totals and chart series.
 */

export { buildReport, compareText } from './build.js';
export { filterTransactions } from './filter.js';
export type { TransactionFilter } from './filter.js';
export { summarizeTotals } from './totals.js';
export type { TotalsOptions } from './totals.js';
export { categoryTotals, expenditureShares, netAmounts } from './charts.js';
export { runningBalances } from './running-balance.js';
export { formatReportLine, paginateReport, type PageLayout } from './paginate.js';
