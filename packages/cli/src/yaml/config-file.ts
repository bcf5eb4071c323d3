import { Document } from 'yaml';
import { mkdir, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname } from 'node:path';
import { LedgerConfigSchema } from '@churchbooks/shared';

/**
 * Renders a default ledger.yaml with every key spelled out.
 */
export function renderDefaultConfig(organization?: string): string {
    const config = LedgerConfigSchema.parse(organization ? { organization } : {});
    const doc = new Document(config);
    doc.commentBefore = [
        ' Churchbooks workspace configuration.',
        ' store.backend: excel | csv',
        ' ledger.id_policy: last | max, ledger.id_case: lower | upper',
        ' reports.totals_rule: columns | category',
    ].join('\n');
    return doc.toString();
}

/**
 * Writes the default config. Refuses to overwrite an existing file.
 */
export async function writeDefaultConfig(filePath: string, organization?: string): Promise<void> {
    if (existsSync(filePath)) {
        throw new Error(`Config already exists: ${filePath}`);
    }
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, renderDefaultConfig(organization));
}
