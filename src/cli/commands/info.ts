import { Command } from 'commander';
import { loadContext, runAction } from '../context.js';
import { formatPluginDetails, print, printJson } from '../ui/render.js';
import { describePlugin } from '../../catalog/catalog.js';

export function createInfoCommand(): Command {
    return new Command('info')
        .description('Show a plugin\'s contents and how to install it')
        .argument('<plugin>', 'Plugin name')
        .option('--json', 'Print details as JSON')
        .action(runAction(async (plugin: string, options: { json?: boolean }, command: Command) => {
            const { root, config } = await loadContext(command);
            const details = await describePlugin(root, plugin, config);

            if (options.json) {
                printJson(details);
            } else {
                print(formatPluginDetails(details));
            }
        }));
}
