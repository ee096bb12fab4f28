import { chmod, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { MarketConfig } from '../config/schema.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';

/** File tree: strings are written as-is, anything else as pretty JSON */
export type FileTree = Record<string, unknown>;

export async function makeTempDir(): Promise<string> {
    return mkdtemp(path.join(tmpdir(), 'plugin-market-'));
}

export async function removeDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

export async function writeTree(root: string, files: FileTree): Promise<void> {
    for (const [relPath, value] of Object.entries(files)) {
        const filePath = path.join(root, relPath);
        await mkdir(path.dirname(filePath), { recursive: true });
        await writeFile(filePath, typeof value === 'string' ? value : JSON.stringify(value, null, 2) + '\n', 'utf-8');
    }
}

export async function makeExecutable(filePath: string): Promise<void> {
    await chmod(filePath, 0o755);
}

export function testConfig(overrides: Partial<MarketConfig> = {}): MarketConfig {
    return { ...DEFAULT_CONFIG, hookEvents: [...DEFAULT_CONFIG.hookEvents], ...overrides };
}

export const COMPLETE_README = '# Demo\n\nA demo plugin.\n\n## Installation\n\nAdd the marketplace.\n\n## Usage\n\nRun `/demo`.\n';

/**
 * Files of a plugin that passes validation with no warnings, keyed relative
 * to `prefix`
 */
export function validPlugin(name: string, prefix = '', overrides: FileTree = {}): FileTree {
    const files: FileTree = {
        'package.json': { name, version: '1.0.0', description: `${name} plugin` },
        'README.md': COMPLETE_README,
        '.claude-plugin/plugin.json': {
            name,
            description: `${name} plugin`,
            version: '1.0.0',
            author: { name: 'Test Author' },
            keywords: ['testing'],
        },
        [`commands/${name}.md`]: `# ${name}\n\nRun the ${name} workflow.\n`,
        ...overrides,
    };

    const tree: FileTree = {};
    for (const [relPath, value] of Object.entries(files)) {
        if (value === undefined) continue;
        tree[prefix ? `${prefix}/${relPath}` : relPath] = value;
    }
    return tree;
}
