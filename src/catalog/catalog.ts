import path from 'node:path';
import type { MarketConfig } from '../config/schema.js';
import type { LoadedPlugin } from '../plugins/types.js';
import { PluginLoader, readPluginManifest } from '../plugins/loader.js';
import { loadMarketplace } from '../marketplace/loader.js';
import { isDirectory, isFile } from '../utils/fs.js';
import { getPluginManifestPath, getPluginMetaDir, PLUGIN_META_DIR, displayPath, isInside } from '../utils/paths.js';
import { ManifestError, PluginNotFoundError } from '../errors.js';

export const NO_DESCRIPTION = 'No description available';

export interface PluginSummary {
    name: string;
    /** `ns/name` for namespaced plugins */
    id: string;
    /** Path relative to the marketplace root */
    path: string;
    description: string;
    version?: string;
    commands: number;
    agents: number;
    skills: number;
}

export interface PluginDetails extends PluginSummary {
    author?: string;
    keywords: string[];
    commandNames: string[];
    agentNames: string[];
    skillNames: string[];
    hookEvents: string[];
    hasMcp: boolean;
    marketplace: string;
    installCommand: string;
}

export function getPluginsDir(root: string, config: MarketConfig): string {
    return path.resolve(root, config.pluginsDir);
}

/**
 * Plugin directories under the configured plugins directory
 */
export async function discoverPlugins(root: string, config: MarketConfig): Promise<string[]> {
    return PluginLoader.discover(getPluginsDir(root, config));
}

export async function listPlugins(root: string, config: MarketConfig): Promise<PluginSummary[]> {
    const loader = new PluginLoader(config.hookEvents);
    const plugins = await loader.loadAll(getPluginsDir(root, config));
    return plugins.map((plugin) => summarize(plugin, root));
}

/**
 * Find a plugin directory by its id (`name` or `ns/name`), else by a
 * directory or manifest name that exactly one plugin has. A directory under the plugins directory that is not
 * (yet) a plugin still resolves, so callers can report what it lacks.
 */
export async function resolvePluginDir(root: string, name: string, config: MarketConfig): Promise<string | null> {
    const pluginsDir = getPluginsDir(root, config);
    const dirs = await PluginLoader.discover(pluginsDir);

    const byId = dirs.find((dir) => path.relative(pluginsDir, dir) === name);
    if (byId) return byId;

    // A bare directory or manifest name resolves only when exactly one plugin carries it
    const byBasename = dirs.filter((dir) => path.basename(dir) === name);
    if (byBasename.length === 1) return byBasename[0] ?? null;

    const direct = path.join(pluginsDir, name);
    if (isInside(pluginsDir, direct) && direct !== pluginsDir && await isDirectory(direct)) {
        return direct;
    }

    const byManifest: string[] = [];
    for (const dir of dirs) {
        const { raw } = await readPluginManifest(dir);
        if (raw?.['name'] === name) byManifest.push(dir);
    }

    return byManifest.length === 1 ? byManifest[0] ?? null : null;
}

/**
 * Names of discovered plugins, for "available plugins" hints
 */
export async function availablePlugins(root: string, config: MarketConfig): Promise<string[]> {
    const pluginsDir = getPluginsDir(root, config);
    return (await PluginLoader.discover(pluginsDir)).map((dir) => path.relative(pluginsDir, dir));
}

/**
 * Plugin details and install hint
 */
export async function describePlugin(root: string, name: string, config: MarketConfig): Promise<PluginDetails> {
    const pluginDir = await resolvePluginDir(root, name, config);
    if (!pluginDir) {
        throw new PluginNotFoundError(name, await availablePlugins(root, config));
    }

    if (!await isDirectory(getPluginMetaDir(pluginDir))) {
        throw new ManifestError(`Plugin '${name}' does not have a ${PLUGIN_META_DIR} directory`, displayPath(pluginDir, root));
    }
    if (!await isFile(getPluginManifestPath(pluginDir))) {
        throw new ManifestError(`Plugin '${name}' does not have a plugin.json manifest`, displayPath(pluginDir, root));
    }

    const loader = new PluginLoader(config.hookEvents);
    const plugin = await loader.loadPlugin(pluginDir, path.relative(getPluginsDir(root, config), pluginDir));
    const marketplace = await resolveMarketplaceName(root, config);

    return {
        ...summarize(plugin, root),
        author: plugin.manifest?.author.name,
        keywords: plugin.keywords,
        commandNames: plugin.commands.map((def) => path.basename(def.path, '.md')),
        agentNames: plugin.agents.map((def) => path.basename(def.path, '.md')),
        skillNames: plugin.skills.map((skill) => skill.name),
        hookEvents: Array.from(new Set(plugin.hooks.map((hook) => hook.event))),
        hasMcp: plugin.hasMcp,
        marketplace,
        installCommand: `/plugin install ${plugin.name}@${marketplace}`,
    };
}

/**
 * Marketplace name for install hints: configured, else the manifest's,
 * else the root directory's name
 */
export async function resolveMarketplaceName(root: string, config: MarketConfig): Promise<string> {
    if (config.marketplaceName) return config.marketplaceName;

    const loaded = await loadMarketplace(root, config);
    if (loaded.status === 'ok') return loaded.manifest.name;

    return path.basename(path.resolve(root));
}

function summarize(plugin: LoadedPlugin, root: string): PluginSummary {
    return {
        name: plugin.name,
        id: plugin.id,
        path: displayPath(plugin.path, root),
        description: plugin.description ?? NO_DESCRIPTION,
        version: plugin.version,
        commands: plugin.commands.length,
        agents: plugin.agents.length,
        skills: plugin.skills.length,
    };
}
