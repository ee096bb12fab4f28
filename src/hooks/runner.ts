import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { HookDefinition, HookContext, HookResult } from './types.js';
import { DEFAULT_HOOK_TIMEOUT_SECONDS } from './types.js';
import { PLUGIN_ROOT_VAR } from '../utils/paths.js';
import { errorMessage } from '../errors.js';

const execFileAsync = promisify(execFile);

/**
 * Hook Runner — executes hook commands as child processes
 *
 * Mirrors how the host assistant fires a hook:
 *   - `${CLAUDE_PLUGIN_ROOT}` expands to the plugin directory, and is also
 *     exported as an environment variable
 *   - the event payload arrives on stdin as JSON
 *   - exit code 0 is success
 */
export class HookRunner {
    async execute(hook: HookDefinition, ctx: HookContext): Promise<HookResult> {
        const start = Date.now();
        const command = expandPluginRoot(hook.command, hook.pluginRoot);
        const timeout = (hook.timeout ?? DEFAULT_HOOK_TIMEOUT_SECONDS) * 1000;

        const payload = JSON.stringify({
            hook_event_name: ctx.event,
            cwd: ctx.cwd,
            ...(ctx.toolName ? { tool_name: ctx.toolName } : {}),
            ...ctx.payload,
        });

        try {
            const pending = execFileAsync('/bin/sh', ['-c', command], {
                cwd: ctx.cwd,
                timeout,
                env: {
                    ...process.env,
                    CLAUDE_PLUGIN_ROOT: hook.pluginRoot,
                    CLAUDE_PROJECT_DIR: ctx.cwd,
                },
            });

            // A hook may exit without reading its input; EPIPE is expected then
            let stdinError: string | undefined;
            pending.child.stdin?.on('error', (err: NodeJS.ErrnoException) => {
                if (err.code !== 'EPIPE') stdinError = err.message;
            });
            pending.child.stdin?.end(payload);

            const { stdout, stderr } = await pending;

            return {
                hook,
                success: stdinError === undefined,
                exitCode: 0,
                stdout: stdout.toString().trim(),
                stderr: stderr.toString().trim(),
                ...(stdinError !== undefined ? { error: `Failed to write hook input: ${stdinError}` } : {}),
                durationMs: Date.now() - start,
            };
        } catch (err) {
            return {
                hook,
                success: false,
                exitCode: exitCodeOf(err),
                stdout: outputOf(err, 'stdout'),
                stderr: outputOf(err, 'stderr'),
                error: errorMessage(err),
                durationMs: Date.now() - start,
            };
        }
    }

    /**
     * Run hooks in order, stopping after the first failure
     */
    async executeAll(hooks: HookDefinition[], ctx: HookContext): Promise<HookResult[]> {
        const results: HookResult[] = [];
        for (const hook of hooks) {
            const result = await this.execute(hook, ctx);
            results.push(result);
            if (!result.success) break;
        }
        return results;
    }
}

/**
 * Replace every `${CLAUDE_PLUGIN_ROOT}` in a command
 */
export function expandPluginRoot(command: string, pluginRoot: string): string {
    return command.split(PLUGIN_ROOT_VAR).join(pluginRoot);
}

function exitCodeOf(err: unknown): number | null {
    if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number') {
        return err.code;
    }
    return null;
}

function outputOf(err: unknown, stream: 'stdout' | 'stderr'): string {
    if (typeof err === 'object' && err !== null && stream in err) {
        const value: unknown = Reflect.get(err, stream);
        if (typeof value === 'string') return value.trim();
    }
    return '';
}
