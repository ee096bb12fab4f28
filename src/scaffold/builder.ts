import { stringify as stringifyYaml } from 'yaml';
import type { PluginConfig, PluginMetadata, CommandConfig, AgentConfig } from './types.js';
import { COMMANDS_DIR, AGENTS_DIR } from '../utils/paths.js';
import { ScaffoldError } from '../errors.js';

/**
 * Builds the files of a plugin from typed definitions
 */
export class PluginBuilder {
    private metadata?: PluginMetadata;
    private commands: CommandConfig[] = [];
    private agents: AgentConfig[] = [];

    withMetadata(metadata: PluginMetadata): this {
        this.metadata = metadata;
        return this;
    }

    addCommand(command: CommandConfig): this {
        this.commands.push(command);
        return this;
    }

    addAgent(agent: AgentConfig): this {
        this.agents.push(agent);
        return this;
    }

    build(): PluginConfig {
        if (!this.metadata) {
            throw new ScaffoldError('Plugin metadata is required');
        }
        return {
            metadata: this.metadata,
            commands: [...this.commands],
            agents: [...this.agents],
        };
    }

    /**
     * `commands/<name>.md` → content
     */
    generateCommandFiles(): Map<string, string> {
        const files = new Map<string, string>();
        for (const command of this.commands) {
            files.set(`${COMMANDS_DIR}/${command.name}.md`, generateCommandContent(command));
        }
        return files;
    }

    /**
     * `agents/<name>.md` → content
     */
    generateAgentFiles(): Map<string, string> {
        const files = new Map<string, string>();
        for (const agent of this.agents) {
            files.set(`${AGENTS_DIR}/${agent.name}.md`, generateAgentContent(agent));
        }
        return files;
    }
}

export function generateCommandContent(command: CommandConfig): string {
    let content = `# ${command.name}\n\n`;
    content += `${command.description}\n\n`;
    content += `---\n\n`;
    content += `${command.prompt}\n`;
    return content;
}

export function generateAgentContent(agent: AgentConfig): string {
    const frontmatter: Record<string, string> = {
        name: agent.name,
        description: agent.description,
    };
    if (agent.tools && agent.tools.length > 0) {
        frontmatter.tools = agent.tools.join(', ');
    }

    let content = `---\n${stringifyYaml(frontmatter)}---\n\n`;
    content += `# ${agent.name}\n\n`;
    content += `${agent.description}\n\n`;
    content += `## Instructions\n\n`;
    content += `${agent.instructions}\n\n`;

    if (agent.tools && agent.tools.length > 0) {
        content += `## Available Tools\n\n`;
        content += agent.tools.map((tool) => `- ${tool}`).join('\n');
        content += '\n\n';
    }

    if (agent.examples && agent.examples.length > 0) {
        content += `## Examples\n\n`;
        for (const example of agent.examples) {
            content += `<example>\n`;
            content += `Context: ${example.context}\n`;
            content += `user: "${example.userMessage}"\n`;
            content += `assistant: "${example.assistantResponse}"\n`;
            content += `<commentary>\n${example.commentary}\n</commentary>\n`;
            content += `</example>\n\n`;
        }
    }

    return content;
}
