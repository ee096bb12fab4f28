/**
 * Scaffold — Types for generating plugin files
 */

export interface PluginMetadata {
    name: string;
    version: string;
    description: string;
    author: { name: string; email?: string };
    keywords: string[];
    license?: string;
    homepage?: string;
}

export interface CommandConfig {
    name: string;
    description: string;
    prompt: string;
}

export interface AgentConfig {
    name: string;
    description: string;
    instructions: string;
    tools?: string[];
    examples?: AgentExample[];
}

export interface AgentExample {
    context: string;
    userMessage: string;
    assistantResponse: string;
    commentary: string;
}

export interface PluginConfig {
    metadata: PluginMetadata;
    commands: CommandConfig[];
    agents: AgentConfig[];
}
