import path from 'node:path';
import type { PluginCheckContext } from './context.js';
import type { SectionBuilder } from '../report.js';
import type { DefinitionKind } from '../../commands/types.js';
import { parseFrontmatter, stringField } from '../../commands/frontmatter.js';
import { isFile, listDirectories, listEntries, listFiles, readText } from '../../utils/fs.js';
import { isKebabCase, pluralize } from '../../utils/naming.js';
import { COMMANDS_DIR, AGENTS_DIR, SKILLS_DIR, MCP_FILE } from '../../utils/paths.js';

const DIRS: Record<DefinitionKind, string> = {
    command: COMMANDS_DIR,
    agent: AGENTS_DIR,
};

const LABELS: Record<DefinitionKind, string> = {
    command: 'Command',
    agent: 'Agent',
};

export interface ContentCounts {
    commands: number;
    agents: number;
    skills: number;
    mcp: boolean;
}

/**
 * Count what the plugin provides. A plugin needs at least one command or
 * agent; skills and MCP servers are reported but do not satisfy that.
 */
export async function checkContent(
    ctx: PluginCheckContext,
    section: SectionBuilder,
    manifest: Record<string, unknown> | null
): Promise<ContentCounts> {
    const counts: ContentCounts = {
        commands: (await listFiles(path.join(ctx.pluginDir, COMMANDS_DIR), '.md')).length,
        agents: (await listFiles(path.join(ctx.pluginDir, AGENTS_DIR), '.md')).length,
        skills: (await listDirectories(path.join(ctx.pluginDir, SKILLS_DIR))).length,
        mcp: manifest?.['mcpServers'] !== undefined || await isFile(path.join(ctx.pluginDir, MCP_FILE)),
    };

    if (counts.commands > 0) section.pass(`Found ${pluralize(counts.commands, 'command')}`, COMMANDS_DIR);
    if (counts.agents > 0) section.pass(`Found ${pluralize(counts.agents, 'agent')}`, AGENTS_DIR);
    if (counts.skills > 0) section.pass(`Found ${pluralize(counts.skills, 'skill')}`, SKILLS_DIR);
    if (counts.mcp) section.pass('MCP server configuration');

    if (counts.commands === 0 && counts.agents === 0) {
        section.error('Plugin has no commands or agents');
    }

    for (const kind of ['command', 'agent'] as const) {
        for (const entry of await listEntries(path.join(ctx.pluginDir, DIRS[kind]))) {
            if (entry.isFile() && !entry.name.startsWith('.') && !entry.name.endsWith('.md')) {
                section.warn(`${DIRS[kind]}/${entry.name} is not a markdown file`, `${DIRS[kind]}/${entry.name}`);
            }
        }
    }

    return counts;
}

/**
 * Per-file checks for every command and agent
 */
export async function checkMarkdownFiles(ctx: PluginCheckContext, section: SectionBuilder): Promise<void> {
    for (const kind of ['command', 'agent'] as const) {
        const dir = DIRS[kind];
        for (const file of await listFiles(path.join(ctx.pluginDir, dir), '.md')) {
            await checkDefinitionFile(ctx, section, kind, `${dir}/${file}`);
        }
    }
}

async function checkDefinitionFile(
    ctx: PluginCheckContext,
    section: SectionBuilder,
    kind: DefinitionKind,
    relPath: string
): Promise<void> {
    const content = await readText(path.join(ctx.pluginDir, relPath)) ?? '';
    const basename = path.basename(relPath, '.md');

    if (content.trim() === '') {
        section.error(`${relPath} is empty`, relPath);
    } else {
        section.pass(`${relPath} has content`, relPath);
    }

    if (!isKebabCase(basename)) {
        section.error(`${LABELS[kind]} "${basename}" should use kebab-case`, relPath);
    }

    const { frontmatter, error } = parseFrontmatter(content);
    if (error) {
        section.error(`${relPath} has invalid frontmatter: ${error}`, relPath);
        return;
    }

    if (kind !== 'agent' || content.trim() === '') return;

    if (!frontmatter) {
        section.warn(`${relPath} has no frontmatter (name, description)`, relPath);
        return;
    }
    for (const key of ['name', 'description']) {
        if (!stringField(frontmatter, key)) {
            section.warn(`${relPath} frontmatter has no ${key}`, relPath);
        }
    }
}
