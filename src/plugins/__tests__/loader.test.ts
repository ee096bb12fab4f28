import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import { PluginLoader, readPluginManifest } from '../loader.js';
import { makeTempDir, removeDir, writeTree, validPlugin } from '../../test-utils/fixtures.js';

describe('PluginLoader', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('discovers only manifest-carrying directories when asked', async () => {
        await writeTree(dir, {
            ...validPlugin('demo', 'demo'),
            'legacy/package.json': { name: 'legacy', version: '1.0.0', description: 'x' },
        });

        expect(await PluginLoader.discover(dir)).toEqual([path.join(dir, 'demo'), path.join(dir, 'legacy')]);
        expect(await PluginLoader.discover(dir, { requireManifest: true })).toEqual([path.join(dir, 'demo')]);
    });

    it('loads a plugin with all of its parts', async () => {
        await writeTree(dir, validPlugin('demo', 'demo', {
            'agents/helper.md': '---\nname: helper\ndescription: Helps\n---\nHelp.\n',
            'hooks/hooks.json': { hooks: { Stop: [{ hooks: [{ type: 'command', command: 'echo bye' }] }] } },
        }));

        const loader = new PluginLoader();
        const [plugin] = await loader.loadAll(dir);

        expect(plugin.id).toBe('demo');
        expect(plugin.manifest?.author.name).toBe('Test Author');
        expect(plugin.keywords).toEqual(['testing']);
        expect(plugin.commands.map((c) => c.name)).toEqual(['demo']);
        expect(plugin.agents.map((a) => a.name)).toEqual(['helper']);
        expect(plugin.hooks.map((h) => h.command)).toEqual(['echo bye']);
        expect(plugin.hasMcp).toBe(false);
    });

    it('loads namespaced plugins keyed by their path, sorted by id', async () => {
        await writeTree(dir, {
            ...validPlugin('zeta', 'zeta'),
            ...validPlugin('lint', 'tools/lint'),
            ...validPlugin('alpha', 'alpha'),
        });

        const plugins = await new PluginLoader().loadAll(dir);

        expect(plugins.map((p) => p.id)).toEqual(['alpha', 'tools/lint', 'zeta']);
    });

    it('still loads a plugin whose hooks file is broken', async () => {
        await writeTree(dir, validPlugin('demo', 'demo', { 'hooks/hooks.json': '{' }));

        const plugin = await new PluginLoader().loadPlugin(path.join(dir, 'demo'));

        expect(plugin.name).toBe('demo');
        expect(plugin.hooks).toEqual([]);
    });

    it('declares MCP servers through plugin.json', async () => {
        await writeTree(dir, validPlugin('demo', 'demo', {
            '.claude-plugin/plugin.json': {
                name: 'demo', description: 'd', version: '1.0.0', author: { name: 'A' }, mcpServers: './mcp.json',
            },
        }));

        const plugin = await new PluginLoader().loadPlugin(path.join(dir, 'demo'));

        expect(plugin.hasMcp).toBe(true);
    });
});

describe('readPluginManifest', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('keeps the raw object when the schema fails', async () => {
        await writeTree(dir, { '.claude-plugin/plugin.json': { name: 'demo' } });

        const { raw, manifest } = await readPluginManifest(dir);

        expect(raw).toEqual({ name: 'demo' });
        expect(manifest).toBeNull();
    });

    it('returns nulls for a missing manifest', async () => {
        expect(await readPluginManifest(dir)).toEqual({ raw: null, manifest: null });
    });
});
