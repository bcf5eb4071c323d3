import { isAbsolute, join, resolve } from 'node:path';
import type { LedgerConfig } from '@churchbooks/shared';
import type { Workspace } from '../types.js';

export const CONFIG_DIR = 'config';
export const CONFIG_FILE = 'ledger.yaml';

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    const absolute = resolve(root);
    return {
        root: absolute,
        configPath: join(absolute, CONFIG_DIR, CONFIG_FILE),
        outputs: join(absolute, 'outputs'),
    };
}

/**
 * Ledger file location; relative store paths are taken from the workspace root.
 */
export function getStorePath(workspace: Workspace, config: LedgerConfig): string {
    return isAbsolute(config.store.path) ? config.store.path : join(workspace.root, config.store.path);
}

/**
 * Export destination; relative names land in the outputs directory.
 */
export function getOutputPath(workspace: Workspace, fileName: string): string {
    return isAbsolute(fileName) ? fileName : join(workspace.outputs, fileName);
}
