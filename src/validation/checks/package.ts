import path from 'node:path';
import type { PluginCheckContext } from './context.js';
import type { SectionBuilder } from '../report.js';
import { packageManifestSchema } from '../../plugins/schema.js';
import { readJsonFile } from '../../utils/fs.js';
import { formatIssues } from '../../utils/schema.js';
import { PACKAGE_MANIFEST } from '../../utils/paths.js';

export async function checkPackageJson(ctx: PluginCheckContext, section: SectionBuilder): Promise<void> {
    const result = await readJsonFile(path.join(ctx.pluginDir, PACKAGE_MANIFEST));

    if (result.status === 'missing') {
        section.add(ctx.config.requirePackageJson ? 'error' : 'warning', 'package.json is missing', PACKAGE_MANIFEST);
        return;
    }

    section.pass('package.json exists', PACKAGE_MANIFEST);

    if (result.status === 'invalid') {
        section.error(`package.json is invalid JSON: ${result.error}`, PACKAGE_MANIFEST);
        return;
    }

    const parsed = packageManifestSchema.safeParse(result.value);
    if (!parsed.success) {
        for (const issue of formatIssues(parsed.error)) {
            section.error(`package.json ${issue}`, PACKAGE_MANIFEST);
        }
        return;
    }

    section.pass('package.json has name, version and description', PACKAGE_MANIFEST);
}
