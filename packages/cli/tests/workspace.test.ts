import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { detectWorkspaceRoot } from '../src/workspace/detect.js';
import { resolveWorkspace, getStorePath, getOutputPath } from '../src/workspace/paths.js';
import { loadConfig, parseConfig, toLedgerOptions } from '../src/workspace/config.js';
import { renderDefaultConfig, writeDefaultConfig } from '../src/yaml/config-file.js';

describe('Workspace Detection', () => {
    let dir: string;

    beforeEach(async () => {
        dir = path.resolve(await mkdtemp(path.join(tmpdir(), 'churchbooks-ws-')));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should find the root from a nested directory', async () => {
        await mkdir(path.join(dir, 'config'));
        await writeFile(path.join(dir, 'config', 'ledger.yaml'), '');
        const nested = path.join(dir, 'outputs', 'march');
        await mkdir(nested, { recursive: true });

        expect(detectWorkspaceRoot(nested)).toBe(dir);
    });

    it('should return null if no workspace is found in parents', () => {
        expect(detectWorkspaceRoot(dir)).toBeNull();
    });
});

describe('Path Resolution', () => {
    const root = path.resolve('/work');
    const workspace = resolveWorkspace(root);

    it('should resolve standard paths correctly', () => {
        expect(workspace.root).toBe(root);
        expect(workspace.configPath).toBe(path.join(root, 'config', 'ledger.yaml'));
        expect(workspace.outputs).toBe(path.join(root, 'outputs'));
    });

    it('should place relative store and output paths inside the workspace', () => {
        const config = parseConfig('');
        expect(getStorePath(workspace, config)).toBe(path.join(root, 'data', 'financial_records.xlsx'));
        expect(getOutputPath(workspace, 'march.csv')).toBe(path.join(root, 'outputs', 'march.csv'));
    });

    it('should keep absolute paths', () => {
        const absolute = path.resolve('/books/ledger.csv');
        const config = parseConfig(`store:\n  path: ${absolute}\n`);
        expect(getStorePath(workspace, config)).toBe(absolute);
        expect(getOutputPath(workspace, absolute)).toBe(absolute);
    });
});

describe('Config', () => {
    it('treats an empty file as all defaults', () => {
        const config = parseConfig('');
        expect(config.organization).toBe('Organization');
        expect(toLedgerOptions(config)).toEqual({
            multiUser: false,
            idPolicy: 'last',
            idCase: 'lower',
            categories: ['Weekly Collection', 'Freewill Donation', 'Fundraising', 'Expenditure'],
        });
    });

    it('maps ledger settings to engine options', () => {
        const config = parseConfig([
            'ledger:',
            '  multi_user: true',
            '  id_policy: max',
            '  id_case: upper',
            'categories: [Tithes, Expenditure]',
        ].join('\n'));
        expect(toLedgerOptions(config)).toEqual({
            multiUser: true,
            idPolicy: 'max',
            idCase: 'upper',
            categories: ['Tithes', 'Expenditure'],
        });
    });

    it('names the offending key', () => {
        expect(() => parseConfig('store:\n  backend: sheets\n', 'config/ledger.yaml'))
            .toThrow(/^Invalid config in config\/ledger\.yaml: store\.backend: /);
    });

    it('renders a default config that parses back', () => {
        const text = renderDefaultConfig('St. Example Parish');
        expect(text.startsWith('# Churchbooks workspace configuration.\n')).toBe(true);
        expect(parseConfig(text)).toEqual(parseConfig('organization: St. Example Parish'));
    });

    describe('on disk', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await mkdtemp(path.join(tmpdir(), 'churchbooks-config-'));
        });

        afterEach(async () => {
            await rm(dir, { recursive: true, force: true });
        });

        it('writes once and loads it', async () => {
            const workspace = resolveWorkspace(dir);
            await writeDefaultConfig(workspace.configPath, 'St. Example Parish');

            expect(loadConfig(workspace).organization).toBe('St. Example Parish');
            await expect(writeDefaultConfig(workspace.configPath)).rejects.toThrow('Config already exists');
            expect(await readFile(workspace.configPath, 'utf-8')).toContain('organization: St. Example Parish');
        });

        it('fails when the config is missing', () => {
            const workspace = resolveWorkspace(dir);
            expect(() => loadConfig(workspace)).toThrow(`Config file not found: ${workspace.configPath}`);
        });
    });
});
