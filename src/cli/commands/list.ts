import { Command } from 'commander';
import chalk from 'chalk';
import { loadContext, runAction } from '../context.js';
import { formatPluginList, print, printJson } from '../ui/render.js';
import { listPlugins } from '../../catalog/catalog.js';

export function createListCommand(): Command {
    return new Command('list')
        .description('List all plugins with their descriptions')
        .option('--json', 'Print plugin summaries as JSON')
        .action(runAction(async (options: { json?: boolean }, command: Command) => {
            const { root, config } = await loadContext(command);
            const plugins = await listPlugins(root, config);

            if (options.json) {
                printJson(plugins);
                return;
            }

            if (plugins.length === 0) {
                console.log(chalk.dim(`No plugins found in ${config.pluginsDir}/.`));
                console.log(chalk.dim(`Create one with:\n  ${chalk.white('plugin-market create <name>')}`));
                return;
            }

            print(formatPluginList(plugins));
            console.log(chalk.dim('To show plugin info:'));
            console.log(chalk.dim(`  ${chalk.white('plugin-market info <plugin>')}`));
            console.log(chalk.dim('To validate a plugin:'));
            console.log(chalk.dim(`  ${chalk.white('plugin-market validate <plugin>')}`));
        }));
}
