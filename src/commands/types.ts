/**
 * Command System — Types
 *
 * Slash commands and agents are both markdown files with optional YAML
 * frontmatter. Commands are prompt templates the user invokes; agents are
 * personas the assistant delegates to.
 */

export type DefinitionKind = 'command' | 'agent';

/**
 * Parsed command or agent definition from a .md file
 */
export interface CommandDefinition {
    kind: DefinitionKind;
    /** Name from frontmatter, or the file's basename */
    name: string;
    /** Human-readable description */
    description: string;
    /** Tools named in frontmatter (empty = unrestricted) */
    tools: string[];
    /** The markdown body after the frontmatter */
    prompt: string;
    /** Absolute path to the source .md file */
    path: string;
    /** Plugin the definition came from */
    source: string;
    /** Raw frontmatter; empty when the file has none */
    frontmatter: Record<string, unknown>;
}
