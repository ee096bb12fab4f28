import path from 'node:path';
import type { PluginCheckContext } from './context.js';
import type { SectionBuilder } from '../report.js';
import { readText } from '../../utils/fs.js';
import { README } from '../../utils/paths.js';

export async function checkReadme(ctx: PluginCheckContext, section: SectionBuilder): Promise<void> {
    const content = await readText(path.join(ctx.pluginDir, README));

    if (content === null) {
        section.warn('README.md is missing (recommended)', README);
        return;
    }

    section.pass('README.md exists', README);

    if (content.trim() === '') {
        section.warn('README.md is empty', README);
        return;
    }

    const lower = content.toLowerCase();
    const missing: string[] = [];

    if (!/^#\s+.+/m.test(content)) {
        section.warn('README.md has no title heading', README);
        missing.push('title');
    }
    if (!lower.includes('install')) {
        section.warn('README.md has no installation instructions', README);
        missing.push('install');
    }
    if (!/usage|example|how to/.test(lower)) {
        section.warn('README.md has no usage examples', README);
        missing.push('usage');
    }

    if (missing.length === 0) {
        section.pass('README.md has title, installation and usage sections', README);
    }
}
