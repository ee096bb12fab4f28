import { parse as parseYaml } from 'yaml';
import { errorMessage } from '../errors.js';
import { isRecord } from '../utils/fs.js';

export interface FrontmatterResult {
    /** Parsed frontmatter; null when the file has no frontmatter block */
    frontmatter: Record<string, unknown> | null;
    body: string;
    /** Set when a frontmatter block is unterminated or not a YAML mapping */
    error?: string;
}

const FRONTMATTER = /^---[ \t]*\r?\n(?:([\s\S]*?)\r?\n)?---[ \t]*(?:\r?\n|$)([\s\S]*)$/;
const OPENING_FENCE = /^---[ \t]*\r?\n/;

/**
 * Split markdown into YAML frontmatter and body
 *
 * ```markdown
 * ---
 * name: code-reviewer
 * description: Reviews diffs for style issues
 * tools: [Read, Grep]
 * ---
 * You are a meticulous reviewer...
 * ```
 */
export function parseFrontmatter(content: string): FrontmatterResult {
    const match = content.match(FRONTMATTER);
    if (!match) {
        return OPENING_FENCE.test(content)
            ? { frontmatter: null, body: content, error: 'unterminated frontmatter block' }
            : { frontmatter: null, body: content };
    }

    const yamlStr = match[1] ?? '';
    const body = match[2] ?? '';

    let parsed: unknown;
    try {
        parsed = parseYaml(yamlStr);
    } catch (err) {
        return { frontmatter: null, body, error: errorMessage(err) };
    }

    // An empty block parses to null
    if (parsed === null || parsed === undefined) {
        return { frontmatter: {}, body };
    }
    if (!isRecord(parsed)) {
        return { frontmatter: null, body, error: 'frontmatter must be a YAML mapping' };
    }

    return { frontmatter: parsed, body };
}

/**
 * String value of a frontmatter key, if it is a non-empty string
 */
export function stringField(frontmatter: Record<string, unknown> | null, key: string): string | undefined {
    const value = frontmatter?.[key];
    return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * List value of a frontmatter key; accepts a YAML list or a comma-separated string
 */
export function listField(frontmatter: Record<string, unknown> | null, key: string): string[] {
    const value = frontmatter?.[key];
    if (Array.isArray(value)) {
        return value.filter((item): item is string => typeof item === 'string');
    }
    if (typeof value === 'string') {
        return value.split(',').map((s) => s.trim()).filter(Boolean);
    }
    return [];
}
