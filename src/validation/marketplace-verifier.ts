import path from 'node:path';
import type { ValidationReport } from './types.js';
import type { MarketConfig } from '../config/schema.js';
import type { MarketplaceEntry, MarketplaceManifest } from '../marketplace/schema.js';
import { ReportBuilder, type SectionBuilder } from './report.js';
import { validatePlugin } from './plugin-validator.js';
import { loadMarketplace, resolveEntrySource } from '../marketplace/loader.js';
import { PluginLoader, readPluginManifest } from '../plugins/loader.js';
import { isDirectory, isFile } from '../utils/fs.js';
import { pluralize } from '../utils/naming.js';
import { displayPath, getPluginManifestPath, README } from '../utils/paths.js';
import { getLogger } from '../utils/logger.js';

export const SECTION_MARKETPLACE = 'Marketplace';
export const SECTION_UNLISTED = 'Unlisted plugins';

export interface VerifyOptions {
    /** Run full plugin validation for every listed plugin */
    deep?: boolean;
    /** Called as each plugin is checked */
    onPlugin?: (name: string) => void;
}

/**
 * Verify a marketplace: its manifest, every listed plugin, and the
 * consistency between the two.
 *
 * When the manifest is missing or unreadable, plugins are discovered from
 * the plugins directory instead so the rest of the tree still gets checked.
 */
export async function verifyMarketplace(
    root: string,
    config: MarketConfig,
    options: VerifyOptions = {}
): Promise<ValidationReport> {
    const absRoot = path.resolve(root);
    const pluginsDir = path.resolve(absRoot, config.pluginsDir);
    const report = new ReportBuilder('marketplace', path.basename(absRoot), absRoot);
    const header = report.section(SECTION_MARKETPLACE);
    const loaded = await loadMarketplace(absRoot, config);
    const manifestFile = displayPath(loaded.path, absRoot);

    if (loaded.status === 'missing') {
        header.error('Marketplace manifest not found', manifestFile);
    } else {
        header.pass('Marketplace manifest exists', manifestFile);
        if (loaded.status === 'invalid-json') {
            header.error(`Marketplace manifest is invalid JSON: ${loaded.error}`, manifestFile);
        } else {
            header.pass('Marketplace manifest is valid JSON', manifestFile);
        }
        if (loaded.status === 'invalid-schema') {
            for (const issue of loaded.issues) {
                header.error(`marketplace.json ${issue}`, manifestFile);
            }
        }
    }

    if (loaded.status !== 'ok') {
        getLogger().debug('Falling back to plugin directory scan', { pluginsDir });
        const dirs = await PluginLoader.discover(pluginsDir, { requireManifest: true });
        for (const dir of dirs) {
            const id = path.relative(pluginsDir, dir);
            options.onPlugin?.(id);
            await checkPluginDir(dir, report.section(id), config, options);
        }
        return report.build({ totalPlugins: dirs.length });
    }

    const { manifest } = loaded;
    report.setTarget(manifest.name);
    header.pass(`Found ${pluralize(manifest.plugins.length, 'plugin')} in marketplace`, manifestFile);

    const seen = new Set<string>();
    const listedDirs = new Set<string>();

    for (const [index, entry] of manifest.plugins.entries()) {
        // Repeated names get their own section so their checks stay apart
        let title = entry.name;
        if (seen.has(entry.name)) {
            header.error(`Duplicate plugin name "${entry.name}" in marketplace`, manifestFile);
            title = `${entry.name} (entry ${index + 1})`;
        }
        seen.add(entry.name);

        options.onPlugin?.(title);
        const dir = await checkEntry(absRoot, manifest, entry, report.section(title), config, options);
        if (dir) listedDirs.add(dir);
    }

    const unlisted = report.section(SECTION_UNLISTED);
    for (const dir of await PluginLoader.discover(pluginsDir)) {
        if (!listedDirs.has(dir)) {
            unlisted.warn(`${displayPath(dir, absRoot)} is not listed in the marketplace`, displayPath(dir, absRoot));
        }
    }

    return report.build({ totalPlugins: manifest.plugins.length });
}

/**
 * Check one marketplace entry; returns its resolved directory when local
 */
async function checkEntry(
    root: string,
    manifest: MarketplaceManifest,
    entry: MarketplaceEntry,
    section: SectionBuilder,
    config: MarketConfig,
    options: VerifyOptions
): Promise<string | null> {
    const source = resolveEntrySource(root, manifest, entry);

    switch (source.kind) {
        case 'remote':
            section.warn(`Remote source (${source.type}) is not checked locally`);
            return null;
        case 'outside':
            section.error(`Source ${String(entry.source)} resolves outside the marketplace root`);
            return null;
        case 'local':
            break;
    }

    const shown = displayPath(source.dir, root);
    if (!await isDirectory(source.dir)) {
        section.error(`Source directory not found: ${shown}`, shown);
        return source.dir;
    }

    const { raw } = await readPluginManifest(source.dir);
    if (raw) {
        const name = raw['name'];
        if (typeof name === 'string' && name !== entry.name) {
            section.error(`Marketplace entry "${entry.name}" does not match plugin.json name "${name}"`, shown);
        }
        const version = raw['version'];
        if (entry.version && typeof version === 'string' && version !== entry.version) {
            section.warn(`Marketplace version ${entry.version} differs from plugin.json version ${version}`, shown);
        }
    }

    await checkPluginDir(source.dir, section, config, options);
    return source.dir;
}

/**
 * Shallow checks for a plugin directory, or the full validator with `deep`
 */
async function checkPluginDir(
    dir: string,
    section: SectionBuilder,
    config: MarketConfig,
    options: VerifyOptions
): Promise<void> {
    if (options.deep) {
        const report = await validatePlugin(dir, config);
        for (const reportSection of report.sections) {
            section.merge(reportSection.checks);
        }
        return;
    }

    if (await isFile(getPluginManifestPath(dir))) {
        section.pass('plugin.json exists');
    } else {
        section.error('plugin.json missing');
    }

    const plugin = await new PluginLoader(config.hookEvents).loadPlugin(dir);
    if (plugin.commands.length > 0) section.pass(pluralize(plugin.commands.length, 'command'));
    if (plugin.agents.length > 0) section.pass(pluralize(plugin.agents.length, 'agent'));
    if (plugin.skills.length > 0) section.pass(pluralize(plugin.skills.length, 'skill'));
    if (plugin.hasMcp) section.pass('MCP server configuration');

    if (plugin.commands.length + plugin.agents.length === 0 && !plugin.hasMcp) {
        section.warn('No commands, agents, or MCP servers found');
    }

    if (await isFile(path.join(dir, README))) {
        section.pass('README.md exists');
    } else {
        section.warn('README.md missing');
    }
}
