import chalk from 'chalk';
import type { Check, ValidationReport } from '../../validation/types.js';
import type { PluginDetails, PluginSummary } from '../../catalog/catalog.js';
import type { HookDefinition } from '../../hooks/types.js';
import { isValid } from '../../validation/report.js';
import { pluralize } from '../../utils/naming.js';

const RULE = '='.repeat(34);

const ICONS: Record<Check['severity'], () => string> = {
    pass: () => chalk.green('✓'),
    warning: () => chalk.yellow('⚠'),
    error: () => chalk.red('✗'),
};

export function formatCheck(check: Check): string {
    const message = check.severity === 'error' ? chalk.red(check.message) : check.message;
    return `  ${ICONS[check.severity]()} ${message}`;
}

/**
 * Lines of a human-readable validation or verification report
 */
export function formatReport(report: ValidationReport, strict = false): string[] {
    const isPlugin = report.kind === 'plugin';
    const lines: string[] = [];

    lines.push(chalk.bold(isPlugin ? `Validating plugin: ${report.target}` : `Marketplace verification: ${report.target}`));
    lines.push(RULE);

    for (const section of report.sections) {
        lines.push('');
        lines.push(chalk.cyan.bold(section.title));
        for (const check of section.checks) {
            lines.push(formatCheck(check));
        }
    }

    lines.push('');
    lines.push(RULE);
    lines.push(isPlugin ? 'Validation complete!' : 'Verification complete!');
    lines.push('');
    lines.push(`Errors: ${report.errors}`);
    lines.push(`Warnings: ${report.warnings}`);
    if (report.totalPlugins !== undefined) {
        lines.push(`Total plugins: ${report.totalPlugins}`);
    }
    lines.push('');

    if (isValid(report, strict)) {
        lines.push(chalk.green.bold(isPlugin ? '✓ Plugin is valid!' : '✓ Marketplace is ready to use!'));
    } else if (report.errors === 0) {
        lines.push(chalk.red.bold('✗ Warnings are treated as errors in strict mode'));
    } else {
        lines.push(chalk.red.bold(isPlugin
            ? '✗ Plugin has errors that need to be fixed'
            : '✗ Please fix errors before using the marketplace'));
    }

    return lines;
}

export function formatPluginList(plugins: PluginSummary[]): string[] {
    const lines: string[] = [chalk.bold(`Available plugins (${plugins.length})`), ''];

    for (const plugin of plugins) {
        const version = plugin.version ? chalk.dim(` v${plugin.version}`) : '';
        lines.push(`  ${chalk.cyan.bold(plugin.id)}${version}`);
        lines.push(`    ${plugin.description}`);

        const parts = [
            pluralize(plugin.commands, 'command'),
            pluralize(plugin.agents, 'agent'),
        ];
        if (plugin.skills > 0) parts.push(pluralize(plugin.skills, 'skill'));
        lines.push(chalk.dim(`    ${parts.join(', ')}`));
        lines.push('');
    }

    return lines;
}

export function formatPluginDetails(details: PluginDetails): string[] {
    const lines: string[] = [];

    lines.push(`${chalk.bold('Plugin:')} ${details.name}${details.version ? chalk.dim(` v${details.version}`) : ''}`);
    lines.push(`${chalk.bold('Location:')} ${details.path}`);
    lines.push(`${chalk.bold('Description:')} ${details.description}`);
    if (details.author) lines.push(`${chalk.bold('Author:')} ${details.author}`);
    if (details.keywords.length > 0) lines.push(`${chalk.bold('Keywords:')} ${details.keywords.join(', ')}`);

    const listing = (title: string, names: string[]) => {
        lines.push('');
        lines.push(chalk.cyan.bold(`${title}: ${names.length}`));
        for (const name of names) lines.push(`  - ${name}`);
    };

    listing('Commands', details.commandNames);
    listing('Agents', details.agentNames);
    if (details.skillNames.length > 0) listing('Skills', details.skillNames);
    if (details.hookEvents.length > 0) listing('Hooks', details.hookEvents);
    if (details.hasMcp) {
        lines.push('');
        lines.push(chalk.cyan.bold('MCP servers: configured'));
    }

    lines.push('');
    lines.push(chalk.bold('To install this plugin:'));
    lines.push(`  1. In your assistant, run: ${chalk.white('/plugin')}`);
    lines.push(`  2. Or run: ${chalk.white(details.installCommand)}`);
    lines.push('');
    lines.push(chalk.dim(`The "${details.marketplace}" marketplace must be configured in your assistant first.`));

    return lines;
}

export function formatHooks(hooks: HookDefinition[]): string[] {
    const lines: string[] = [];
    const byEvent = new Map<string, HookDefinition[]>();
    for (const hook of hooks) {
        byEvent.set(hook.event, [...(byEvent.get(hook.event) ?? []), hook]);
    }

    for (const [event, list] of byEvent) {
        lines.push(chalk.cyan.bold(`  ${event}`));
        for (const hook of list) {
            const match = hook.matcher ? chalk.dim(` [match: ${hook.matcher}]`) : '';
            const timeout = hook.timeout ? chalk.dim(` (${hook.timeout}s)`) : '';
            lines.push(`    → ${chalk.white(hook.command)}${match}${timeout}`);
        }
        lines.push('');
    }

    return lines;
}

export function print(lines: string[]): void {
    for (const line of lines) {
        console.log(line);
    }
}

export function printJson(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
}
