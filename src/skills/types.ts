/**
 * A skill: `skills/<dir>/SKILL.md` whose frontmatter tells the assistant
 * when to pull the guidance in.
 */
export interface SkillDefinition {
    name: string;
    description: string;
    /** Skill directory name */
    dirName: string;
    /** Absolute path to SKILL.md */
    path: string;
    /** Only invoked when the user asks for it */
    userInvocable: boolean;
    body: string;
    source: string;
}
