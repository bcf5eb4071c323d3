export { parseDateValue, toIsoDate, parseIsoDate, parseMdyDate, excelSerialToDate, formatIsoDate, isValidDate } from './date-parse.js';
export { parseAmount, parseSignedAmount, formatAmount, normalizeAmount, sumAmounts } from './amount.js';
export {
    nextId,
    nextFreeId,
    incrementLedgerId,
    parseLedgerId,
    formatLedgerId,
    baseLedgerId,
    sameId,
} from './ledger-id.js';
export type { ParsedLedgerId, NextIdOptions } from './ledger-id.js';
export { stripBom, cleanHeaders, cellText } from './csv.js';
