/**
 * Ledger error taxonomy.
 *
 * Every failure the engine surfaces carries a stable `code` so the CLI can
 * map it without string matching on messages.
 */

export type LedgerErrorCode =
    | 'INVALID_DATE'
    | 'INVALID_CATEGORY'
    | 'EXHAUSTED_ID_SPACE'
    | 'STORE_UNAVAILABLE'
    | 'NOT_FOUND';

export class LedgerError extends Error {
    readonly code: LedgerErrorCode;

    constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'LedgerError';
        this.code = code;
    }
}

export class InvalidDateError extends LedgerError {
    constructor(value: unknown) {
        super('INVALID_DATE', `Invalid date: ${String(value)}. Use YYYY-MM-DD or MM/DD/YYYY.`);
        this.name = 'InvalidDateError';
    }
}

export class InvalidCategoryError extends LedgerError {
    constructor(category: string, allowed: readonly string[]) {
        const message = category.trim() === ''
            ? 'Category is required.'
            : `Unknown category "${category}". Expected one of: ${allowed.join(', ')}.`;
        super('INVALID_CATEGORY', message);
        this.name = 'InvalidCategoryError';
    }
}

export class ExhaustedIdSpaceError extends LedgerError {
    constructor(lastId: string) {
        super('EXHAUSTED_ID_SPACE', `No identifier follows ${lastId}: id space exhausted.`);
        this.name = 'ExhaustedIdSpaceError';
    }
}

export class StoreUnavailableError extends LedgerError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('STORE_UNAVAILABLE', message, options);
        this.name = 'StoreUnavailableError';
    }
}

export class NotFoundError extends LedgerError {
    constructor(id: string, user?: string) {
        super('NOT_FOUND', user === undefined
            ? `Transaction ${id} not found.`
            : `Transaction ${id} not found for user "${user}".`);
        this.name = 'NotFoundError';
    }
}

export function isLedgerError(err: unknown): err is LedgerError {
    return err instanceof LedgerError;
}
