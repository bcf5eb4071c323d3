import type { LedgerConfig } from '@churchbooks/shared';
import { LedgerEngine, type LedgerStore } from '@churchbooks/core';
import type { Workspace } from './types.js';
import { detectWorkspaceRoot } from './workspace/detect.js';
import { resolveWorkspace } from './workspace/paths.js';
import { loadConfig, toLedgerOptions } from './workspace/config.js';
import { createLedgerStore } from './store/index.js';
import { warn } from './utils/console.js';

/**
 * Everything a command needs: the workspace, its config, and an engine over
 * the configured store.
 */
export interface LedgerSession {
    workspace: Workspace;
    config: LedgerConfig;
    store: LedgerStore;
    engine: LedgerEngine;
}

export function openSession(workspaceRoot?: string): LedgerSession {
    const root = workspaceRoot || detectWorkspaceRoot();
    if (!root) {
        throw new Error('Workspace not found. Run "churchbooks init" or pass --workspace <dir>.');
    }

    const workspace = resolveWorkspace(root);
    const config = loadConfig(workspace);
    const store = createLedgerStore(workspace, config);
    const engine = new LedgerEngine(store, toLedgerOptions(config));

    return { workspace, config, store, engine };
}

/**
 * Print and clear warnings the engine collected while reading.
 */
export function flushWarnings(session: LedgerSession): void {
    for (const message of session.engine.warnings.splice(0)) {
        warn(message);
    }
}
