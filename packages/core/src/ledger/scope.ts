import type { LedgerOptions, Transaction } from '../types/index.js';

/**
 * The rows a balance and id-uniqueness rule applies to: the whole ledger,
 * or one user's rows when the deployment partitions by user.
 */
export type Scope =
    | { kind: 'ledger' }
    | { kind: 'user'; user: string | undefined };

/**
 * Blank owner labels mean "no owner".
 */
export function normalizeUser(user: string | undefined): string | undefined {
    const trimmed = user?.trim();
    return trimmed ? trimmed : undefined;
}

export function scopeFor(options: Pick<LedgerOptions, 'multiUser'>, user?: string): Scope {
    return options.multiUser
        ? { kind: 'user', user: normalizeUser(user) }
        : { kind: 'ledger' };
}

/**
 * Scope a stored row belongs to.
 */
export function scopeOf(txn: Transaction, options: Pick<LedgerOptions, 'multiUser'>): Scope {
    return scopeFor(options, txn.user);
}

export function inScope(txn: Transaction, scope: Scope): boolean {
    return scope.kind === 'ledger' || normalizeUser(txn.user) === scope.user;
}
