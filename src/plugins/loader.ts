import path from 'node:path';
import type { LoadedPlugin } from './types.js';
import { pluginManifestSchema, type PluginManifest } from './schema.js';
import { CommandLoader } from '../commands/loader.js';
import { SkillLoader } from '../skills/loader.js';
import { HookRegistry } from '../hooks/registry.js';
import {
    isDirectory, isFile, listDirectories, readJsonFile, isRecord,
} from '../utils/fs.js';
import {
    PLUGIN_META_DIR, PACKAGE_MANIFEST, COMMANDS_DIR, AGENTS_DIR, SKILLS_DIR, MCP_FILE,
    getPluginManifestPath, getHooksFilePath,
} from '../utils/paths.js';
import { formatIssues } from '../utils/schema.js';
import { getLogger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';

export interface DiscoverOptions {
    /** Only directories that carry `.claude-plugin/plugin.json` count */
    requireManifest?: boolean;
}

/**
 * Plugin Loader — discovers and loads plugin directories
 *
 * Plugins live directly under the plugins directory (`plugins/<name>/`)
 * or one level down in a namespace (`plugins/<namespace>/<name>/`).
 */
export class PluginLoader {
    private commandLoader = new CommandLoader();
    private skillLoader = new SkillLoader();

    constructor(private hookEvents?: readonly string[]) {}

    /**
     * Find plugin directories, sorted by path
     */
    static async discover(pluginsDir: string, options: DiscoverOptions = {}): Promise<string[]> {
        const found: string[] = [];

        for (const name of await listDirectories(pluginsDir)) {
            const dir = path.join(pluginsDir, name);
            if (await isPluginDir(dir, options)) {
                found.push(dir);
                continue;
            }

            // Namespace directory
            for (const child of await listDirectories(dir)) {
                const childDir = path.join(dir, child);
                if (await isPluginDir(childDir, options)) {
                    found.push(childDir);
                }
            }
        }

        return found.sort();
    }

    /**
     * Load every plugin under a plugins directory
     */
    async loadAll(pluginsDir: string, options: DiscoverOptions = {}): Promise<LoadedPlugin[]> {
        const plugins: LoadedPlugin[] = [];
        for (const dir of await PluginLoader.discover(pluginsDir, options)) {
            plugins.push(await this.loadPlugin(dir, path.relative(pluginsDir, dir)));
        }

        return plugins.sort((a, b) => a.id.localeCompare(b.id));
    }

    /**
     * Load a single plugin. Problems are logged, never thrown: a plugin with
     * a broken manifest still loads with `manifest: null`.
     */
    async loadPlugin(pluginDir: string, id = path.basename(pluginDir)): Promise<LoadedPlugin> {
        const { raw, manifest } = await readPluginManifest(pluginDir);
        const name = manifest?.name ?? stringOf(raw?.['name']) ?? path.basename(pluginDir);

        let description = manifest?.description ?? stringOf(raw?.['description']);
        let version = manifest?.version ?? stringOf(raw?.['version']);

        if (!description || !version) {
            const pkg = await readJsonFile(path.join(pluginDir, PACKAGE_MANIFEST));
            if (pkg.status === 'ok' && isRecord(pkg.value)) {
                description ??= stringOf(pkg.value['description']);
                version ??= stringOf(pkg.value['version']);
            }
        }

        const commands = await this.commandLoader.loadFromDirectory(path.join(pluginDir, COMMANDS_DIR), name, 'command');
        const agents = await this.commandLoader.loadFromDirectory(path.join(pluginDir, AGENTS_DIR), name, 'agent');
        const skills = await this.skillLoader.loadFromDirectory(path.join(pluginDir, SKILLS_DIR), name);

        const registry = new HookRegistry(this.hookEvents);
        try {
            await registry.loadFromFile(getHooksFilePath(pluginDir), name, pluginDir);
        } catch (err) {
            getLogger().warn(`Failed to load hooks for ${name}: ${errorMessage(err)}`);
        }

        const hasMcp = raw?.['mcpServers'] !== undefined || await isFile(path.join(pluginDir, MCP_FILE));

        const rawKeywords = raw?.['keywords'];
        const keywords = Array.isArray(rawKeywords)
            ? rawKeywords.filter((k): k is string => typeof k === 'string')
            : [];

        return {
            name,
            path: pluginDir,
            id,
            manifest,
            description,
            version,
            keywords,
            commands,
            agents,
            skills,
            hooks: registry.all(),
            hasMcp,
        };
    }
}

/**
 * Read plugin.json leniently: the raw object when it parses, and the
 * schema-checked manifest when it also validates.
 */
export async function readPluginManifest(pluginDir: string): Promise<{
    raw: Record<string, unknown> | null;
    manifest: PluginManifest | null;
}> {
    const manifestPath = getPluginManifestPath(pluginDir);
    const result = await readJsonFile(manifestPath);

    if (result.status === 'missing') {
        return { raw: null, manifest: null };
    }
    if (result.status === 'invalid' || !isRecord(result.value)) {
        getLogger().warn(`Unreadable plugin manifest at ${manifestPath}`);
        return { raw: null, manifest: null };
    }

    const parsed = pluginManifestSchema.safeParse(result.value);
    if (!parsed.success) {
        getLogger().debug(`Plugin manifest at ${manifestPath} fails validation`, { issues: formatIssues(parsed.error) });
        return { raw: result.value, manifest: null };
    }

    return { raw: result.value, manifest: parsed.data };
}

async function isPluginDir(dir: string, options: DiscoverOptions): Promise<boolean> {
    if (options.requireManifest) {
        return isFile(getPluginManifestPath(dir));
    }
    return await isDirectory(path.join(dir, PLUGIN_META_DIR)) || await isFile(path.join(dir, PACKAGE_MANIFEST));
}

function stringOf(value: unknown): string | undefined {
    return typeof value === 'string' && value !== '' ? value : undefined;
}
