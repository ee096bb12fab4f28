import type { HookDefinition } from './types.js';
import { ALL_HOOK_EVENTS } from './types.js';
import { hooksFileSchema } from './schema.js';
import { readJsonFile } from '../utils/fs.js';
import { formatIssues } from '../utils/schema.js';
import { getLogger } from '../utils/logger.js';
import { ManifestError } from '../errors.js';

/**
 * Hook Registry — stores a plugin's hook definitions by event
 *
 * Definitions come from each plugin's `hooks/hooks.json`. Unknown events
 * are logged and skipped; a file that does not parse is a ManifestError.
 */
export class HookRegistry {
    private hooks: Map<string, HookDefinition[]> = new Map();

    constructor(private validEvents: readonly string[] = ALL_HOOK_EVENTS) {
        for (const event of validEvents) {
            this.hooks.set(event, []);
        }
    }

    /**
     * Register a hook for a specific event
     */
    register(hook: HookDefinition): void {
        if (!this.validEvents.includes(hook.event)) {
            throw new Error(`Unknown hook event: "${hook.event}". Valid events: ${this.validEvents.join(', ')}`);
        }
        const list = this.hooks.get(hook.event) ?? [];
        list.push(hook);
        this.hooks.set(hook.event, list);
    }

    /**
     * Load hooks from a hooks.json file; returns the number registered
     */
    async loadFromFile(filePath: string, source: string, pluginRoot: string): Promise<number> {
        const result = await readJsonFile(filePath);
        if (result.status === 'missing') {
            return 0; // No hooks — not an error
        }
        if (result.status === 'invalid') {
            throw new ManifestError(`Invalid JSON in ${filePath}: ${result.error}`, filePath);
        }

        const parsed = hooksFileSchema.safeParse(result.value);
        if (!parsed.success) {
            throw new ManifestError(`Invalid hooks file ${filePath}: ${formatIssues(parsed.error).join('; ')}`, filePath);
        }

        let count = 0;
        for (const [event, matchers] of Object.entries(parsed.data.hooks)) {
            if (!this.validEvents.includes(event)) {
                getLogger().warn(`Ignoring unknown hook event "${event}" in ${filePath}`);
                continue;
            }

            for (const matcher of matchers) {
                for (const hook of matcher.hooks) {
                    this.register({
                        event,
                        type: 'command',
                        command: hook.command,
                        timeout: hook.timeout,
                        matcher: matcher.matcher,
                        source,
                        pluginRoot,
                    });
                    count++;
                }
            }
        }

        return count;
    }

    /**
     * Hooks for an event whose matcher accepts the tool name
     */
    matching(event: string, toolName?: string): HookDefinition[] {
        const definitions = this.hooks.get(event) ?? [];
        return definitions.filter((hook) => matches(hook.matcher, toolName));
    }

    /**
     * List all events that have hooks
     */
    list(): { event: string; hooks: HookDefinition[] }[] {
        const result: { event: string; hooks: HookDefinition[] }[] = [];
        for (const [event, hooks] of Array.from(this.hooks)) {
            if (hooks.length > 0) {
                result.push({ event, hooks });
            }
        }
        return result;
    }

    all(): HookDefinition[] {
        return this.list().flatMap((entry) => entry.hooks);
    }

    get size(): number {
        let total = 0;
        for (const hooks of Array.from(this.hooks.values())) {
            total += hooks.length;
        }
        return total;
    }

    clear(): void {
        for (const event of this.validEvents) {
            this.hooks.set(event, []);
        }
    }
}

/**
 * Whether a matcher pattern accepts a tool name. Events without a tool
 * (SessionStart, Stop, ...) run every hook.
 */
export function matches(matcher: string | undefined, toolName?: string): boolean {
    if (!matcher || matcher === '*' || toolName === undefined) {
        return true;
    }
    try {
        return new RegExp(`^(?:${matcher})$`).test(toolName);
    } catch {
        getLogger().warn(`Invalid hook matcher pattern: ${matcher}`);
        return false;
    }
}
