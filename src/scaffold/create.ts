import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { MarketConfig } from '../config/schema.js';
import type { PluginMetadata } from './types.js';
import { PluginBuilder } from './builder.js';
import { pluginJson, packageJson, readme } from './templates.js';
import { addMarketplaceEntry } from '../marketplace/loader.js';
import { resolveMarketplaceName, getPluginsDir } from '../catalog/catalog.js';
import { pathExists } from '../utils/fs.js';
import { isKebabCase, isVersion, toTitle } from '../utils/naming.js';
import { getPluginManifestPath, PACKAGE_MANIFEST, README, displayPath } from '../utils/paths.js';
import { getLogger } from '../utils/logger.js';
import { ScaffoldError } from '../errors.js';

export interface CreatePluginOptions {
    name: string;
    description: string;
    author: { name: string; email?: string };
    version?: string;
    keywords?: string[];
    license?: string;
    /** Place the plugin under `plugins/<namespace>/<name>` */
    namespace?: string;
    /** Command names; defaults to one command named after the plugin */
    commands?: string[];
    agents?: string[];
    /** Add the plugin to the marketplace manifest */
    register?: boolean;
}

export interface CreatePluginResult {
    dir: string;
    /** Written files, relative to the marketplace root */
    files: string[];
    /** Marketplace manifest path when the plugin was registered */
    marketplacePath?: string;
}

/**
 * Scaffold a new plugin that passes validation out of the box
 */
export async function createPlugin(
    root: string,
    options: CreatePluginOptions,
    config: MarketConfig
): Promise<CreatePluginResult> {
    const version = options.version ?? '0.1.0';
    const commandNames = options.commands ?? (options.agents?.length ? [] : [options.name]);
    const agentNames = options.agents ?? [];

    assertKebab('Plugin', options.name);
    if (options.namespace) assertKebab('Namespace', options.namespace);
    commandNames.forEach((name) => assertKebab('Command', name));
    agentNames.forEach((name) => assertKebab('Agent', name));

    if (!isVersion(version)) {
        throw new ScaffoldError(`Version "${version}" must be in major.minor.patch format`);
    }
    if (options.description.trim() === '') {
        throw new ScaffoldError('A description is required');
    }
    if (options.author.name.trim() === '') {
        throw new ScaffoldError('An author name is required');
    }

    const pluginsDir = getPluginsDir(root, config);
    const dir = options.namespace
        ? path.join(pluginsDir, options.namespace, options.name)
        : path.join(pluginsDir, options.name);

    if (await pathExists(dir)) {
        throw new ScaffoldError(`Plugin directory already exists: ${displayPath(dir, root)}`);
    }

    const metadata: PluginMetadata = {
        name: options.name,
        version,
        description: options.description.trim(),
        author: options.author,
        keywords: options.keywords ?? [],
        ...(options.license ? { license: options.license } : {}),
    };

    const builder = new PluginBuilder().withMetadata(metadata);
    for (const name of commandNames) {
        builder.addCommand({
            name,
            description: `${toTitle(name)} command.`,
            prompt: 'Describe the steps the assistant should follow.\n\nArguments: $ARGUMENTS',
        });
    }
    for (const name of agentNames) {
        builder.addAgent({
            name,
            description: `${toTitle(name)} agent.`,
            instructions: 'Describe the role, responsibilities and constraints of this agent.',
        });
    }

    const pluginConfig = builder.build();
    const marketplace = await resolveMarketplaceName(root, config);

    const files = new Map<string, string>([
        [path.relative(dir, getPluginManifestPath(dir)), json(pluginJson(metadata))],
        [PACKAGE_MANIFEST, json(packageJson(metadata))],
        [README, readme(pluginConfig, marketplace)],
        ...builder.generateCommandFiles(),
        ...builder.generateAgentFiles(),
    ]);

    const written: string[] = [];
    for (const [relPath, content] of files) {
        const filePath = path.join(dir, relPath);
        await mkdir(path.dirname(filePath), { recursive: true });
        await writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
        written.push(displayPath(filePath, root));
    }

    getLogger().debug(`Created plugin ${options.name}`, { dir });

    const result: CreatePluginResult = { dir, files: written };

    if (options.register) {
        const source = './' + path.relative(path.resolve(root), dir).split(path.sep).join('/');
        result.marketplacePath = await addMarketplaceEntry(root, config, {
            name: options.name,
            source,
            description: metadata.description,
            version,
        }, options.author);
    }

    return result;
}

function assertKebab(label: string, name: string): void {
    if (!isKebabCase(name)) {
        throw new ScaffoldError(`${label} name "${name}" must be kebab-case (e.g. "rails-workflow")`);
    }
}

function json(value: unknown): string {
    return JSON.stringify(value, null, 2) + '\n';
}
