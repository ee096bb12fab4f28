import path from 'node:path';
import type { PluginCheckContext } from './context.js';
import type { SectionBuilder } from '../report.js';
import { DEPRECATED_MATCHER_FIELDS } from '../../hooks/types.js';
import { expandPluginRoot } from '../../hooks/runner.js';
import { isExecutable, isFile, isRecord, listFiles, readJsonFile, readText } from '../../utils/fs.js';
import { pluralize } from '../../utils/naming.js';
import { HOOKS_DIR, HOOKS_FILE, PLUGIN_ROOT_VAR, displayPath } from '../../utils/paths.js';

const HOOKS_JSON = `${HOOKS_DIR}/${HOOKS_FILE}`;

/**
 * Check hooks/hooks.json structure, events and referenced scripts
 */
export async function checkHooksFile(ctx: PluginCheckContext, section: SectionBuilder): Promise<void> {
    const result = await readJsonFile(path.join(ctx.pluginDir, HOOKS_JSON));
    if (result.status === 'missing') return;

    if (result.status === 'invalid') {
        section.error(`hooks.json is invalid JSON: ${result.error}`, HOOKS_JSON);
        return;
    }
    section.pass('hooks.json is valid JSON', HOOKS_JSON);

    const hooks = isRecord(result.value) ? result.value['hooks'] : undefined;
    if (!isRecord(hooks)) {
        section.error('hooks.json has no "hooks" object', HOOKS_JSON);
        return;
    }

    const before = section.count('error');
    let commandCount = 0;

    for (const [event, matchers] of Object.entries(hooks)) {
        if (!ctx.config.hookEvents.includes(event)) {
            section.error(`Invalid hook event: "${event}"`, HOOKS_JSON);
        }
        if (!Array.isArray(matchers)) {
            section.error(`Event "${event}" should have an array value`, HOOKS_JSON);
            continue;
        }

        for (const [i, matcher] of matchers.entries()) {
            const where = `${event}[${i}]`;
            if (!isRecord(matcher)) {
                section.error(`${where} should be an object`, HOOKS_JSON);
                continue;
            }

            for (const field of DEPRECATED_MATCHER_FIELDS) {
                if (field in matcher) {
                    section.error(`${where} uses deprecated "${field}" field`, HOOKS_JSON);
                }
            }

            const commands = matcher['hooks'];
            if (!Array.isArray(commands)) {
                section.error(`${where} has no "hooks" array`, HOOKS_JSON);
                continue;
            }

            for (const [j, hook] of commands.entries()) {
                commandCount++;
                await checkHookCommand(ctx, section, `${where}.hooks[${j}]`, hook);
            }
        }
    }

    if (section.count('error') === before) {
        section.pass(`Registered ${pluralize(commandCount, 'hook command')}`, HOOKS_JSON);
    }
}

async function checkHookCommand(
    ctx: PluginCheckContext,
    section: SectionBuilder,
    where: string,
    hook: unknown
): Promise<void> {
    if (!isRecord(hook)) {
        section.error(`${where} should be an object`, HOOKS_JSON);
        return;
    }
    if (hook['type'] !== 'command') {
        section.error(`${where} type must be "command"`, HOOKS_JSON);
    }

    const command = hook['command'];
    if (typeof command !== 'string' || command.trim() === '') {
        section.error(`${where} has no command`, HOOKS_JSON);
        return;
    }

    if (!command.includes(PLUGIN_ROOT_VAR)) {
        section.warn(`${where} command does not use ${PLUGIN_ROOT_VAR}`, HOOKS_JSON);
        return;
    }

    const script = scriptOf(command, ctx.pluginDir);
    if (!script) return;

    const shown = displayPath(script.path, ctx.pluginDir);
    if (!await isFile(script.path)) {
        section.error(`Script not found: ${shown}`, HOOKS_JSON);
    } else if (script.direct && !await isExecutable(script.path)) {
        section.error(`Script not executable: ${shown}`, HOOKS_JSON);
    }
}

/**
 * The script a command runs: the first word that references the plugin
 * root, expanded. `direct` when that word is the program itself rather than
 * an argument (`bash ${CLAUDE_PLUGIN_ROOT}/x.sh`).
 */
export function scriptOf(command: string, pluginDir: string): { path: string; direct: boolean } | null {
    const words = command.trim().split(/\s+/);
    const index = words.findIndex((word) => word.includes(PLUGIN_ROOT_VAR));
    if (index === -1) return null;

    const word = words[index].replace(/^["']|["']$/g, '');
    return { path: expandPluginRoot(word, pluginDir), direct: index === 0 };
}

/**
 * Check every hooks/*.sh script
 */
export async function checkHookScripts(ctx: PluginCheckContext, section: SectionBuilder): Promise<void> {
    for (const file of await listFiles(path.join(ctx.pluginDir, HOOKS_DIR), '.sh')) {
        const relPath = `${HOOKS_DIR}/${file}`;
        const fullPath = path.join(ctx.pluginDir, relPath);
        const content = await readText(fullPath) ?? '';

        if (await isExecutable(fullPath)) {
            section.pass(`${relPath} is executable`, relPath);
        } else {
            section.error(`${relPath} is not executable`, relPath);
        }

        if (!content.startsWith('#!')) {
            section.error(`${relPath} is missing a shebang`, relPath);
        }
        if (/\[\[\s+.*?\s+\]\]/.test(content)) {
            section.warn(`${relPath} uses [[ ]] test (not POSIX); use [ ] instead`, relPath);
        }
        if (/^\s*function \w+/m.test(content)) {
            section.warn(`${relPath} uses the 'function' keyword (not POSIX)`, relPath);
        }
    }
}
