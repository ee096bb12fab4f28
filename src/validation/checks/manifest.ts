import type { PluginCheckContext } from './context.js';
import type { SectionBuilder } from '../report.js';
import { pluginManifestSchema } from '../../plugins/schema.js';
import { isRecord, readJsonFile } from '../../utils/fs.js';
import { formatIssues } from '../../utils/schema.js';
import { isKebabCase } from '../../utils/naming.js';
import { getPluginManifestPath, PLUGIN_META_DIR, PLUGIN_MANIFEST } from '../../utils/paths.js';

const MANIFEST_FILE = `${PLUGIN_META_DIR}/${PLUGIN_MANIFEST}`;

/**
 * Check plugin.json; returns the parsed object when it is valid JSON
 */
export async function checkPluginManifest(
    ctx: PluginCheckContext,
    section: SectionBuilder
): Promise<Record<string, unknown> | null> {
    const result = await readJsonFile(getPluginManifestPath(ctx.pluginDir));

    if (result.status === 'missing') {
        section.error('plugin.json manifest is missing', MANIFEST_FILE);
        return null;
    }

    section.pass('plugin.json manifest exists', MANIFEST_FILE);

    if (result.status === 'invalid') {
        section.error(`plugin.json is invalid JSON: ${result.error}`, MANIFEST_FILE);
        return null;
    }
    if (!isRecord(result.value)) {
        section.error('plugin.json must contain a JSON object', MANIFEST_FILE);
        return null;
    }

    section.pass('plugin.json is valid JSON', MANIFEST_FILE);

    const manifest = result.value;
    const parsed = pluginManifestSchema.safeParse(manifest);
    if (parsed.success) {
        section.pass('plugin.json has required fields', MANIFEST_FILE);
    } else {
        for (const issue of formatIssues(parsed.error)) {
            section.error(`plugin.json ${issue}`, MANIFEST_FILE);
        }
    }

    const name = manifest['name'];
    if (typeof name === 'string' && name !== '' && !isKebabCase(name)) {
        section.error(`Plugin name "${name}" should use kebab-case`, MANIFEST_FILE);
    }

    const keywords = manifest['keywords'];
    if (!Array.isArray(keywords) || keywords.length === 0) {
        section.warn('plugin.json has no keywords', MANIFEST_FILE);
    }

    return manifest;
}
