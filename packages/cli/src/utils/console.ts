/**
 * Formatted console output helpers
 */

export function log(message: string): void {
    console.log(message);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function error(message: string): void {
    console.error(`✖ ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}

/**
 * Left-aligned text columns, numeric-looking cells right-aligned.
 */
export function formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string[] {
    const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((row) => (row[i] ?? '').length)));
    const isNumeric = (value: string) => /^-?\d+(\.\d+)?%?$/.test(value);

    const render = (cells: readonly string[]) => cells
        .map((cell, i) => (isNumeric(cell) ? cell.padStart(widths[i]) : cell.padEnd(widths[i])))
        .join('  ')
        .trimEnd();

    return [
        render(headers),
        widths.map((w) => '-'.repeat(w)).join('  '),
        ...rows.map(render),
    ];
}

export function table(headers: readonly string[], rows: readonly (readonly string[])[]): void {
    for (const line of formatTable(headers, rows)) {
        log(line);
    }
}
