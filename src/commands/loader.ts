import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { CommandDefinition, DefinitionKind } from './types.js';
import { parseFrontmatter, stringField, listField } from './frontmatter.js';
import { listFiles } from '../utils/fs.js';
import { getLogger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';

/**
 * Command Loader — discovers and parses command and agent .md files
 *
 * Files with unreadable or malformed frontmatter are logged and skipped;
 * the validator reports them in detail.
 */
export class CommandLoader {
    /**
     * Load definitions from a directory of .md files
     */
    async loadFromDirectory(dirPath: string, source: string, kind: DefinitionKind = 'command'): Promise<CommandDefinition[]> {
        const loaded: CommandDefinition[] = [];

        for (const file of await listFiles(dirPath, '.md')) {
            const def = await this.parseFile(path.join(dirPath, file), source, kind);
            if (def) loaded.push(def);
        }

        return loaded;
    }

    /**
     * Parse a single markdown definition file
     */
    async parseFile(filePath: string, source: string, kind: DefinitionKind): Promise<CommandDefinition | null> {
        let content: string;
        try {
            content = await readFile(filePath, 'utf-8');
        } catch (err) {
            getLogger().warn(`Failed to read ${kind} at ${filePath}: ${errorMessage(err)}`);
            return null;
        }

        const { frontmatter, body, error } = parseFrontmatter(content);
        if (error) {
            getLogger().warn(`Skipping ${kind} at ${filePath}: ${error}`);
            return null;
        }

        const name = stringField(frontmatter, 'name') ?? path.basename(filePath, '.md');

        return {
            kind,
            name,
            description: stringField(frontmatter, 'description') ?? firstLine(body) ?? `${kind === 'agent' ? 'Agent' : 'Command'}: ${name}`,
            tools: listField(frontmatter, 'tools'),
            prompt: body.trim(),
            path: filePath,
            source,
            frontmatter: frontmatter ?? {},
        };
    }
}

/**
 * First prose line of a markdown body, skipping headings
 */
function firstLine(body: string): string | undefined {
    for (const line of body.split('\n')) {
        const trimmed = line.trim();
        if (trimmed && !trimmed.startsWith('#')) return trimmed;
    }
    return undefined;
}
