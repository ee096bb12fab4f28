import path from 'node:path';
import type { PluginCheckContext } from './context.js';
import type { SectionBuilder } from '../report.js';
import { parseFrontmatter, stringField } from '../../commands/frontmatter.js';
import { listDirectories, readText } from '../../utils/fs.js';
import { isKebabCase } from '../../utils/naming.js';
import { SKILLS_DIR, SKILL_FILE } from '../../utils/paths.js';

export async function checkSkills(ctx: PluginCheckContext, section: SectionBuilder): Promise<void> {
    for (const dirName of await listDirectories(path.join(ctx.pluginDir, SKILLS_DIR))) {
        const relPath = `${SKILLS_DIR}/${dirName}/${SKILL_FILE}`;
        const content = await readText(path.join(ctx.pluginDir, relPath));

        if (content === null) {
            section.error(`${SKILLS_DIR}/${dirName} is missing ${SKILL_FILE}`, relPath);
            continue;
        }

        const { frontmatter, error } = parseFrontmatter(content);
        if (error) {
            section.error(`${relPath} has invalid frontmatter: ${error}`, relPath);
            continue;
        }
        if (!frontmatter) {
            section.error(`${relPath} has no frontmatter`, relPath);
            continue;
        }

        const before = section.count('error');
        const name = stringField(frontmatter, 'name');
        if (!name) section.error(`${relPath} frontmatter is missing "name"`, relPath);
        if (!stringField(frontmatter, 'description')) section.error(`${relPath} frontmatter is missing "description"`, relPath);

        if (name && !isKebabCase(name)) {
            section.warn(`Skill "${name}" should use kebab-case`, relPath);
        }

        if (section.count('error') === before) {
            section.pass(`${relPath} is valid`, relPath);
        }
    }
}
