import type { PluginMetadata, PluginConfig } from './types.js';
import { toTitle } from '../utils/naming.js';

export function pluginJson(metadata: PluginMetadata): Record<string, unknown> {
    return {
        name: metadata.name,
        description: metadata.description,
        version: metadata.version,
        author: metadata.author,
        keywords: metadata.keywords,
        ...(metadata.license ? { license: metadata.license } : {}),
        ...(metadata.homepage ? { homepage: metadata.homepage } : {}),
    };
}

export function packageJson(metadata: PluginMetadata): Record<string, unknown> {
    return {
        name: metadata.name,
        version: metadata.version,
        description: metadata.description,
        keywords: metadata.keywords,
        author: metadata.author.email
            ? `${metadata.author.name} <${metadata.author.email}>`
            : metadata.author.name,
        ...(metadata.license ? { license: metadata.license } : {}),
    };
}

export function readme(config: PluginConfig, marketplace: string): string {
    const { metadata } = config;
    let content = `# ${toTitle(metadata.name)}\n\n`;
    content += `${metadata.description}\n\n`;

    content += `## Installation\n\n`;
    content += '```\n';
    content += `/plugin install ${metadata.name}@${marketplace}\n`;
    content += '```\n\n';

    content += `## Usage\n\n`;
    if (config.commands.length > 0) {
        content += `### Commands\n\n`;
        for (const command of config.commands) {
            content += `- \`/${command.name}\`: ${command.description}\n`;
        }
        content += '\n';
    }
    if (config.agents.length > 0) {
        content += `### Agents\n\n`;
        for (const agent of config.agents) {
            content += `- **${agent.name}**: ${agent.description}\n`;
        }
        content += '\n';
    }

    return content;
}
