import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { z } from 'zod';

const root = new URL('../../../', import.meta.url);

const readJson = (path: string): unknown => JSON.parse(readFileSync(new URL(path, root), 'utf-8'));

const PackageSchema = z.object({
    name: z.string(),
    exports: z.object({ '.': z.object({ types: z.string(), default: z.string() }) }).optional(),
    bin: z.record(z.string()).optional(),
    files: z.array(z.string()).optional(),
});

const BuildConfigSchema = z.object({
    compilerOptions: z.object({ composite: z.boolean(), rootDir: z.string(), outDir: z.string() }),
    references: z.array(z.object({ path: z.string() })).optional(),
});

describe('workspace packaging', () => {
    it.each(['shared', 'core'])('%s exports built JavaScript at run time and sources to the type-checker', (pkg) => {
        const manifest = PackageSchema.parse(readJson(`packages/${pkg}/package.json`));
        expect(manifest.exports?.['.']).toEqual({ types: './src/index.ts', default: './dist/index.js' });
        expect(manifest.files).toEqual(['dist']);
    });

    it.each(['shared', 'core', 'cli'])('%s builds src/ into its own dist/', (pkg) => {
        const config = BuildConfigSchema.parse(readJson(`packages/${pkg}/tsconfig.build.json`));
        expect(config.compilerOptions).toEqual({ composite: true, rootDir: 'src', outDir: 'dist' });
    });

    it('points the command at the built entry point', () => {
        const cli = PackageSchema.parse(readJson('packages/cli/package.json'));
        const workspace = PackageSchema.parse(readJson('package.json'));

        expect(cli.bin).toEqual({ churchbooks: './dist/index.js' });
        expect(workspace.bin).toEqual({ churchbooks: 'packages/cli/dist/index.js' });
    });

    it('builds the command after the packages it imports', () => {
        const config = BuildConfigSchema.parse(readJson('packages/cli/tsconfig.build.json'));
        expect(config.references).toEqual([
            { path: '../shared/tsconfig.build.json' },
            { path: '../core/tsconfig.build.json' },
        ]);
    });
});
