import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { LedgerConfigSchema, type LedgerConfig, type LedgerOptions } from '@churchbooks/shared';
import type { Workspace } from '../types.js';

/**
 * Loads and validates config/ledger.yaml. Missing keys take their defaults;
 * an empty file is a valid, all-default config.
 */
export function loadConfig(workspace: Workspace): LedgerConfig {
    const path = workspace.configPath;
    if (!existsSync(path)) {
        throw new Error(`Config file not found: ${path}`);
    }
    const content = readFileSync(path, 'utf-8');
    return parseConfig(content, path);
}

export function parseConfig(content: string, source = 'ledger.yaml'): LedgerConfig {
    const data: unknown = parse(content) ?? {};
    const result = LedgerConfigSchema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new Error(`Invalid config in ${source}: ${issues.join('; ')}`);
    }
    return result.data;
}

/**
 * Engine options from the workspace config.
 */
export function toLedgerOptions(config: LedgerConfig): LedgerOptions {
    return {
        multiUser: config.ledger.multi_user,
        idPolicy: config.ledger.id_policy,
        idCase: config.ledger.id_case,
        categories: config.categories,
    };
}
