/**
 * Plugin System — Types
 *
 * A plugin is a directory bundling commands, agents, skills and hooks
 * behind a `.claude-plugin/plugin.json` manifest.
 */

import type { PluginManifest } from './schema.js';
import type { CommandDefinition } from '../commands/types.js';
import type { SkillDefinition } from '../skills/types.js';
import type { HookDefinition } from '../hooks/types.js';

export type { PluginManifest, PackageManifest, PluginAuthor } from './schema.js';

/**
 * Loaded plugin with resolved paths
 */
export interface LoadedPlugin {
    /** Manifest name, or the directory name when the manifest is unusable */
    name: string;
    /** Absolute path to the plugin directory */
    path: string;
    /** Path relative to the plugins directory (`ns/name` for namespaced plugins) */
    id: string;
    /** Parsed manifest; null when missing or failing its schema */
    manifest: PluginManifest | null;
    description?: string;
    version?: string;
    keywords: string[];
    commands: CommandDefinition[];
    agents: CommandDefinition[];
    skills: SkillDefinition[];
    hooks: HookDefinition[];
    /** Declares MCP servers in plugin.json or ships `.mcp.json` */
    hasMcp: boolean;
}
