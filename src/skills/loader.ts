import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { SkillDefinition } from './types.js';
import { parseFrontmatter, stringField } from '../commands/frontmatter.js';
import { listDirectories } from '../utils/fs.js';
import { SKILL_FILE } from '../utils/paths.js';
import { getLogger } from '../utils/logger.js';

/**
 * Skill Loader — reads `<skillsDir>/<name>/SKILL.md`
 */
export class SkillLoader {
    async loadFromDirectory(skillsDir: string, source: string): Promise<SkillDefinition[]> {
        const skills: SkillDefinition[] = [];

        for (const dirName of await listDirectories(skillsDir)) {
            const skill = await this.loadSkill(path.join(skillsDir, dirName), source);
            if (skill) skills.push(skill);
        }

        return skills;
    }

    async loadSkill(skillDir: string, source: string): Promise<SkillDefinition | null> {
        const skillPath = path.join(skillDir, SKILL_FILE);
        let content: string;
        try {
            content = await readFile(skillPath, 'utf-8');
        } catch {
            getLogger().debug(`No ${SKILL_FILE} in ${skillDir}`);
            return null;
        }

        const { frontmatter, body, error } = parseFrontmatter(content);
        const name = stringField(frontmatter, 'name');
        const description = stringField(frontmatter, 'description');

        if (error || !name || !description) {
            getLogger().warn(`Skipping skill at ${skillPath}: frontmatter needs name and description`);
            return null;
        }

        const invocable = frontmatter?.['user-invocable'];

        return {
            name,
            description,
            dirName: path.basename(skillDir),
            path: skillPath,
            userInvocable: invocable === true,
            body: body.trim(),
            source,
        };
    }
}
