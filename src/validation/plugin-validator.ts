import path from 'node:path';
import type { ValidationReport } from './types.js';
import type { MarketConfig } from '../config/schema.js';
import { ReportBuilder } from './report.js';
import { checkPackageJson } from './checks/package.js';
import { checkReadme } from './checks/readme.js';
import { checkPluginManifest } from './checks/manifest.js';
import { checkContent, checkMarkdownFiles } from './checks/markdown.js';
import { checkSkills } from './checks/skills.js';
import { checkHooksFile, checkHookScripts } from './checks/hooks.js';
import type { PluginCheckContext } from './checks/context.js';
import { isDirectory } from '../utils/fs.js';
import { getPluginMetaDir, PLUGIN_META_DIR } from '../utils/paths.js';
import { getLogger } from '../utils/logger.js';

export const SECTION_STRUCTURE = 'Structure';
export const SECTION_MARKDOWN = 'Markdown files';
export const SECTION_SKILLS = 'Skills';
export const SECTION_HOOKS = 'Hooks';

/**
 * Validate one plugin directory.
 *
 * Never throws for bad content: every problem is a check in the report.
 * A missing `.claude-plugin/` directory ends validation early.
 */
export async function validatePlugin(pluginDir: string, config: MarketConfig): Promise<ValidationReport> {
    const absDir = path.resolve(pluginDir);
    const report = new ReportBuilder('plugin', path.basename(absDir), absDir);
    const ctx: PluginCheckContext = { pluginDir: absDir, config };

    getLogger().debug(`Validating plugin at ${absDir}`);

    const structure = report.section(SECTION_STRUCTURE);
    await checkPackageJson(ctx, structure);
    await checkReadme(ctx, structure);

    if (!await isDirectory(getPluginMetaDir(absDir))) {
        structure.error(`${PLUGIN_META_DIR} directory is missing`, PLUGIN_META_DIR);
        return report.build();
    }
    structure.pass(`${PLUGIN_META_DIR} directory exists`, PLUGIN_META_DIR);

    const manifest = await checkPluginManifest(ctx, structure);
    const name = manifest?.['name'];
    if (typeof name === 'string' && name !== '') {
        report.setTarget(name);
    }

    await checkContent(ctx, structure, manifest);
    await checkMarkdownFiles(ctx, report.section(SECTION_MARKDOWN));
    await checkSkills(ctx, report.section(SECTION_SKILLS));

    const hooks = report.section(SECTION_HOOKS);
    await checkHooksFile(ctx, hooks);
    await checkHookScripts(ctx, hooks);

    return report.build();
}
