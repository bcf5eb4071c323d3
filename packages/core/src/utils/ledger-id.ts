/**
 * Sequential ledger identifiers: a letter and a 4-digit counter.
 *
 *   a0001, a0002, ... a9999, b0001, ... z9999
 *
 * The next id is derived from an anchor id in the existing table:
 *   - policy 'last': the most recently appended well-formed id (default)
 *   - policy 'max':  the lexicographically greatest well-formed id
 *
 * The two disagree once rows stop being in id order, e.g. after a table
 * was edited by hand. Malformed ids never serve as the anchor.
 */

import type { IdCase, IdPolicy } from '../types/index.js';
import { LEDGER_ID, ExhaustedIdSpaceError } from '../types/index.js';

const ID_PATTERN = new RegExp(`^([a-zA-Z])(\\d{${LEDGER_ID.DIGITS}})$`);

export interface ParsedLedgerId {
    letter: string;   // always lower case
    number: number;
}

export interface NextIdOptions {
    policy?: IdPolicy;
    letterCase?: IdCase;
}

/**
 * Split an id into letter and counter. Returns null for malformed ids.
 */
export function parseLedgerId(id: string): ParsedLedgerId | null {
    const match = id.match(ID_PATTERN);
    if (!match) return null;
    return { letter: match[1].toLowerCase(), number: parseInt(match[2], 10) };
}

export function formatLedgerId(letter: string, number: number, letterCase: IdCase = 'lower'): string {
    const cased = letterCase === 'upper' ? letter.toUpperCase() : letter.toLowerCase();
    return `${cased}${String(number).padStart(LEDGER_ID.DIGITS, '0')}`;
}

export function baseLedgerId(letterCase: IdCase = 'lower'): string {
    return formatLedgerId(LEDGER_ID.BASE_LETTER, LEDGER_ID.BASE_NUMBER, letterCase);
}

/**
 * The id that follows `id`: counter + 1, or the next letter at 0001 after 9999.
 *
 * @throws ExhaustedIdSpaceError after z9999
 * @throws Error when `id` is malformed
 */
export function incrementLedgerId(id: string, letterCase: IdCase = 'lower'): string {
    const parsed = parseLedgerId(id);
    if (!parsed) {
        throw new Error(`Malformed ledger id: ${id}`);
    }

    if (parsed.number < LEDGER_ID.MAX_NUMBER) {
        return formatLedgerId(parsed.letter, parsed.number + 1, letterCase);
    }

    if (parsed.letter === LEDGER_ID.LAST_LETTER) {
        throw new ExhaustedIdSpaceError(id);
    }

    const nextLetter = String.fromCharCode(parsed.letter.charCodeAt(0) + 1);
    return formatLedgerId(nextLetter, LEDGER_ID.BASE_NUMBER, letterCase);
}

/**
 * Next identifier for a table whose ids are `existingIds`, in append order.
 * An empty table (or one without a single well-formed id) starts at a0001.
 */
export function nextId(existingIds: readonly string[], options: NextIdOptions = {}): string {
    const { policy = 'last', letterCase = 'lower' } = options;
    const wellFormed = existingIds.filter((id) => parseLedgerId(id) !== null);

    if (wellFormed.length === 0) {
        return baseLedgerId(letterCase);
    }

    const anchor = policy === 'max'
        ? wellFormed.reduce((best, id) => (id.toLowerCase() > best.toLowerCase() ? id : best))
        : wellFormed[wellFormed.length - 1];

    return incrementLedgerId(anchor, letterCase);
}

/**
 * Like nextId, but skips ids already present in `existingIds`.
 * Ids compare case-insensitively.
 */
export function nextFreeId(existingIds: readonly string[], options: NextIdOptions = {}): string {
    const taken = new Set(existingIds.map((id) => id.toLowerCase()));
    let candidate = nextId(existingIds, options);
    while (taken.has(candidate.toLowerCase())) {
        candidate = incrementLedgerId(candidate, options.letterCase);
    }
    return candidate;
}

export function sameId(a: string, b: string): boolean {
    return a.toLowerCase() === b.toLowerCase();
}
