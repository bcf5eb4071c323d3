/**
 * Table cell helpers shared by the stores.
 */

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * BOM (\uFEFF) can interfere with column header matching in CSVs.
 */
export function stripBom(value: string): string {
    if (value.startsWith('\uFEFF')) {
        return value.slice(1);
    }
    return value;
}

/**
 * Re-key a parsed row by trimmed, BOM-free header names.
 */
export function cleanHeaders(row: Record<string, unknown>): Record<string, unknown> {
    const clean: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(row)) {
        clean[stripBom(k).trim()] = v;
    }
    return clean;
}

/**
 * Cell value as trimmed text; null/undefined become ''.
 */
export function cellText(value: unknown): string {
    if (value === null || value === undefined) return '';
    return String(value).trim();
}
