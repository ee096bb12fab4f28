import { Command } from 'commander';
import chalk from 'chalk';
import path from 'node:path';
import { loadContext, runAction } from '../context.js';
import { formatHooks, print } from '../ui/render.js';
import { HookRegistry } from '../../hooks/registry.js';
import { HookRunner } from '../../hooks/runner.js';
import { availablePlugins, resolvePluginDir } from '../../catalog/catalog.js';
import { readPluginManifest } from '../../plugins/loader.js';
import { getHooksFilePath } from '../../utils/paths.js';
import { isRecord } from '../../utils/fs.js';
import { PluginNotFoundError, PluginMarketError, errorMessage } from '../../errors.js';
import type { CliContext } from '../context.js';

const EVENT_GROUPS: Record<string, { events: string[]; description: string }> = {
    'Tool': {
        events: ['PreToolUse', 'PostToolUse'],
        description: 'Fires around individual tool calls; matchers filter by tool name',
    },
    'Prompt': {
        events: ['UserPromptSubmit', 'Notification', 'Stop', 'PreCompact'],
        description: 'Fires as the conversation progresses',
    },
    'Session': {
        events: ['SessionStart', 'SessionEnd'],
        description: 'Fires at session boundaries',
    },
};

async function loadPluginHooks(ctx: CliContext, plugin: string): Promise<HookRegistry> {
    const pluginDir = await resolvePluginDir(ctx.root, plugin, ctx.config);
    if (!pluginDir) {
        throw new PluginNotFoundError(plugin, await availablePlugins(ctx.root, ctx.config));
    }

    const { raw } = await readPluginManifest(pluginDir);
    const name = raw ? raw['name'] : undefined;
    const source = typeof name === 'string' ? name : path.basename(pluginDir);

    const registry = new HookRegistry(ctx.config.hookEvents);
    await registry.loadFromFile(getHooksFilePath(pluginDir), source, pluginDir);
    return registry;
}

function parsePayload(json: string | undefined): Record<string, unknown> {
    if (!json) return {};
    let value: unknown;
    try {
        value = JSON.parse(json);
    } catch (err) {
        throw new PluginMarketError(`--payload is not valid JSON: ${errorMessage(err)}`);
    }
    if (!isRecord(value)) {
        throw new PluginMarketError('--payload must be a JSON object');
    }
    return value;
}

export function createHooksCommand(): Command {
    const cmd = new Command('hooks')
        .description('Inspect and fire plugin hooks');

    // ─── List hooks ───
    cmd.command('list')
        .description('List the hooks a plugin registers')
        .argument('<plugin>', 'Plugin name')
        .action(runAction(async (plugin: string, _options: unknown, command: Command) => {
            const ctx = await loadContext(command);
            const registry = await loadPluginHooks(ctx, plugin);

            if (registry.size === 0) {
                console.log(chalk.dim(`No hooks registered by ${plugin}.`));
                console.log(chalk.dim(`\nDeclare hooks in ${chalk.white('hooks/hooks.json')}`));
                return;
            }

            console.log(chalk.bold(`\nHooks registered by ${plugin} (${registry.size})\n`));
            print(formatHooks(registry.all()));
        }));

    // ─── Events reference ───
    cmd.command('events')
        .description('Show all accepted hook events')
        .action(runAction(async (_options: unknown, command: Command) => {
            const { config } = await loadContext(command);
            console.log(chalk.bold('\nAccepted Hook Events\n'));

            const grouped = new Set<string>();
            for (const [group, info] of Object.entries(EVENT_GROUPS)) {
                const events = info.events.filter((event) => config.hookEvents.includes(event));
                if (events.length === 0) continue;

                console.log(chalk.cyan.bold(`  ${group}`));
                console.log(chalk.dim(`  ${info.description}`));
                for (const event of events) {
                    console.log(`    • ${chalk.white(event)}`);
                    grouped.add(event);
                }
                console.log();
            }

            const other = config.hookEvents.filter((event) => !grouped.has(event));
            if (other.length > 0) {
                console.log(chalk.cyan.bold('  Other'));
                for (const event of other) {
                    console.log(`    • ${chalk.white(event)}`);
                }
                console.log();
            }
        }));

    // ─── Fire hooks ───
    cmd.command('run')
        .description('Fire a plugin\'s hooks for an event, as the assistant would')
        .argument('<plugin>', 'Plugin name')
        .argument('<event>', 'Hook event (PreToolUse, SessionStart, ...)')
        .option('-t, --tool <name>', 'Tool name for matcher filtering')
        .option('-p, --payload <json>', 'Extra JSON fields for the hook input')
        .action(runAction(async (plugin: string, event: string, options: { tool?: string; payload?: string }, command: Command) => {
            const ctx = await loadContext(command);
            if (!ctx.config.hookEvents.includes(event)) {
                throw new PluginMarketError(`Unknown event: "${event}". Valid events: ${ctx.config.hookEvents.join(', ')}`);
            }

            const registry = await loadPluginHooks(ctx, plugin);
            const hooks = registry.matching(event, options.tool);
            if (hooks.length === 0) {
                console.log(chalk.dim(`No ${event} hooks match${options.tool ? ` tool "${options.tool}"` : ''}.`));
                return;
            }

            const results = await new HookRunner().executeAll(hooks, {
                event,
                toolName: options.tool,
                payload: parsePayload(options.payload),
                cwd: ctx.root,
            });

            for (const result of results) {
                const status = result.success ? chalk.green('✓') : chalk.red(`✗ exit ${result.exitCode ?? '?'}`);
                console.log(`${status} ${result.hook.command} ${chalk.dim(`(${result.durationMs}ms)`)}`);
                if (result.stdout) console.log(chalk.dim(result.stdout.replace(/^/gm, '    ')));
                if (result.stderr) console.log(chalk.yellow(result.stderr.replace(/^/gm, '    ')));
            }

            if (results.some((result) => !result.success)) {
                process.exitCode = 1;
            }
        }));

    return cmd;
}
