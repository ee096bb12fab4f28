import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { marketplaceManifestSchema, type MarketplaceEntry, type MarketplaceManifest } from './schema.js';
import { readJsonFile } from '../utils/fs.js';
import { formatIssues } from '../utils/schema.js';
import { isInside } from '../utils/paths.js';
import { ManifestError } from '../errors.js';
import type { MarketConfig } from '../config/schema.js';

export type MarketplaceLoadResult =
    | { status: 'ok'; path: string; manifest: MarketplaceManifest }
    | { status: 'missing'; path: string }
    | { status: 'invalid-json'; path: string; error: string }
    | { status: 'invalid-schema'; path: string; issues: string[]; raw: unknown };

export type ResolvedSource =
    | { kind: 'local'; dir: string }
    | { kind: 'remote'; type: string }
    | { kind: 'outside'; dir: string };

export function getMarketplacePath(root: string, config: MarketConfig): string {
    return path.resolve(root, config.marketplaceFile);
}

/**
 * Read the marketplace manifest without throwing
 */
export async function loadMarketplace(root: string, config: MarketConfig): Promise<MarketplaceLoadResult> {
    const manifestPath = getMarketplacePath(root, config);
    const result = await readJsonFile(manifestPath);

    if (result.status === 'missing') {
        return { status: 'missing', path: manifestPath };
    }
    if (result.status === 'invalid') {
        return { status: 'invalid-json', path: manifestPath, error: result.error };
    }

    const parsed = marketplaceManifestSchema.safeParse(result.value);
    if (!parsed.success) {
        return { status: 'invalid-schema', path: manifestPath, issues: formatIssues(parsed.error), raw: result.value };
    }

    return { status: 'ok', path: manifestPath, manifest: parsed.data };
}

/**
 * Resolve an entry's source to a directory under the marketplace root.
 *
 * Bare names (not starting with ./ or ../) are joined onto
 * `metadata.pluginRoot` when one is set.
 */
export function resolveEntrySource(root: string, manifest: MarketplaceManifest, entry: MarketplaceEntry): ResolvedSource {
    if (typeof entry.source !== 'string') {
        return { kind: 'remote', type: entry.source.source };
    }

    let sourcePath = entry.source;
    const pluginRoot = manifest.metadata?.pluginRoot;
    if (pluginRoot && !sourcePath.startsWith('./') && !sourcePath.startsWith('../')) {
        sourcePath = path.join(pluginRoot, sourcePath);
    }

    const dir = path.resolve(root, sourcePath);
    if (!isInside(root, dir)) {
        return { kind: 'outside', dir };
    }
    return { kind: 'local', dir };
}

/**
 * Append a plugin entry to the marketplace manifest, creating the manifest
 * when it does not exist yet.
 */
export async function addMarketplaceEntry(
    root: string,
    config: MarketConfig,
    entry: MarketplaceEntry,
    owner: { name: string; email?: string }
): Promise<string> {
    const loaded = await loadMarketplace(root, config);
    let manifest: MarketplaceManifest;

    switch (loaded.status) {
        case 'ok':
            manifest = loaded.manifest;
            break;
        case 'missing':
            manifest = {
                name: config.marketplaceName ?? path.basename(path.resolve(root)),
                owner,
                plugins: [],
            };
            break;
        case 'invalid-json':
            throw new ManifestError(`Marketplace manifest is invalid JSON: ${loaded.error}`, loaded.path);
        case 'invalid-schema':
            throw new ManifestError(`Marketplace manifest is invalid: ${loaded.issues.join('; ')}`, loaded.path);
    }

    if (manifest.plugins.some((existing) => existing.name === entry.name)) {
        throw new ManifestError(`Plugin "${entry.name}" is already listed in the marketplace`, loaded.path);
    }

    manifest.plugins.push(entry);
    await mkdir(path.dirname(loaded.path), { recursive: true });
    await writeFile(loaded.path, JSON.stringify(manifest, null, 2) + '\n', 'utf-8');
    return loaded.path;
}
