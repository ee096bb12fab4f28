import path from 'node:path';

export const PLUGIN_META_DIR = '.claude-plugin';
export const PLUGIN_MANIFEST = 'plugin.json';
export const PACKAGE_MANIFEST = 'package.json';
export const README = 'README.md';
export const COMMANDS_DIR = 'commands';
export const AGENTS_DIR = 'agents';
export const SKILLS_DIR = 'skills';
export const SKILL_FILE = 'SKILL.md';
export const HOOKS_DIR = 'hooks';
export const HOOKS_FILE = 'hooks.json';
export const MCP_FILE = '.mcp.json';
export const CONFIG_FILE = 'plugin-market.config.json';

/** Placeholder the host expands to the plugin's directory in hook commands */
export const PLUGIN_ROOT_VAR = '${CLAUDE_PLUGIN_ROOT}';

export function getPluginMetaDir(pluginDir: string): string {
    return path.join(pluginDir, PLUGIN_META_DIR);
}

export function getPluginManifestPath(pluginDir: string): string {
    return path.join(pluginDir, PLUGIN_META_DIR, PLUGIN_MANIFEST);
}

export function getHooksFilePath(pluginDir: string): string {
    return path.join(pluginDir, HOOKS_DIR, HOOKS_FILE);
}

/**
 * Path for display: relative to `from` when inside it, absolute otherwise
 */
export function displayPath(target: string, from: string): string {
    const rel = path.relative(from, target);
    if (rel === '') return '.';
    return rel.startsWith('..') || path.isAbsolute(rel) ? target : rel;
}

/**
 * Whether `target` is `root` or lies beneath it
 */
export function isInside(root: string, target: string): boolean {
    const resolvedRoot = path.resolve(root);
    const resolved = path.resolve(target);
    return resolved === resolvedRoot || resolved.startsWith(resolvedRoot + path.sep);
}
