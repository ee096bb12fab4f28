/**
 * Hook System — Types
 *
 * Plugins register shell commands the host assistant runs at lifecycle
 * points (before/after tool calls, prompt submission, session boundaries).
 * They are declared in `hooks/hooks.json`:
 *
 * ```json
 * {
 *   "hooks": {
 *     "PreToolUse": [
 *       { "matcher": "Edit|Write", "hooks": [
 *         { "type": "command", "command": "${CLAUDE_PLUGIN_ROOT}/hooks/check.sh" }
 *       ] }
 *     ]
 *   }
 * }
 * ```
 */

// ─── Hook Events ───

export type HookEvent =
    // Tool-level
    | 'PreToolUse'
    | 'PostToolUse'
    // Prompt-level
    | 'UserPromptSubmit'
    | 'Notification'
    | 'Stop'
    | 'PreCompact'
    // Session-level
    | 'SessionStart'
    | 'SessionEnd';

export const ALL_HOOK_EVENTS: HookEvent[] = [
    'PreToolUse', 'PostToolUse',
    'UserPromptSubmit', 'Notification', 'Stop', 'PreCompact',
    'SessionStart', 'SessionEnd',
];

/** Matcher-level keys from the old hooks.json layout */
export const DEPRECATED_MATCHER_FIELDS = ['script', 'required', 'timeout_ms'] as const;

/** Seconds a hook may run before it is killed */
export const DEFAULT_HOOK_TIMEOUT_SECONDS = 60;

// ─── Hook Definition ───

export interface HookCommand {
    type: 'command';
    /** Shell command; may reference ${CLAUDE_PLUGIN_ROOT} */
    command: string;
    /** Timeout in seconds */
    timeout?: number;
}

export interface HookMatcher {
    /** Regex on the tool name; empty or `*` matches every tool */
    matcher?: string;
    hooks: HookCommand[];
}

/**
 * A single command hook as registered, flattened out of its matcher
 */
export interface HookDefinition extends HookCommand {
    event: string;
    matcher?: string;
    /** Plugin the hook came from */
    source: string;
    /** Plugin directory, substituted for ${CLAUDE_PLUGIN_ROOT} */
    pluginRoot: string;
}

// ─── Hook Context ───

export interface HookContext {
    event: string;
    /** Tool name for tool-level events */
    toolName?: string;
    /** Payload written to the hook's stdin as JSON */
    payload?: Record<string, unknown>;
    cwd: string;
}

// ─── Hook Execution Result ───

export interface HookResult {
    hook: HookDefinition;
    success: boolean;
    exitCode: number | null;
    stdout: string;
    stderr: string;
    error?: string;
    durationMs: number;
}
