import { resolveWorkspace } from '../workspace/paths.js';
import { writeDefaultConfig } from '../yaml/config-file.js';
import { arrow, success } from '../utils/console.js';
import type { InitOptions } from '../types.js';

export async function initWorkspace(options: InitOptions): Promise<void> {
    const workspace = resolveWorkspace(options.directory);
    await writeDefaultConfig(workspace.configPath, options.organization);

    success(`Workspace created: ${workspace.root}`);
    arrow(`Config: ${workspace.configPath}`);
    arrow('Edit categories and the store backend there before adding transactions.');
}
