import { Command } from 'commander';
import path from 'node:path';
import { loadContext, runAction, printAvailable } from '../context.js';
import { formatReport, print, printJson } from '../ui/render.js';
import { validatePlugin } from '../../validation/plugin-validator.js';
import { isValid } from '../../validation/report.js';
import { availablePlugins, resolvePluginDir } from '../../catalog/catalog.js';
import { isDirectory } from '../../utils/fs.js';
import { PluginNotFoundError } from '../../errors.js';

interface ValidateOptions {
    strict?: boolean;
    json?: boolean;
}

export function createValidateCommand(): Command {
    return new Command('validate')
        .description('Validate a plugin\'s structure, manifests, markdown and hooks')
        .argument('[plugin]', 'Plugin name (as listed under the plugins directory) or path')
        .option('--strict', 'Treat warnings as errors')
        .option('--json', 'Print the report as JSON')
        .action(runAction(async (plugin: string | undefined, options: ValidateOptions, command: Command) => {
            const { root, config } = await loadContext(command);

            if (!plugin) {
                console.log('Usage: plugin-market validate <plugin>');
                printAvailable(await availablePlugins(root, config));
                process.exitCode = 1;
                return;
            }

            let pluginDir = await resolvePluginDir(root, plugin, config);
            if (!pluginDir && await isDirectory(path.resolve(plugin))) {
                pluginDir = path.resolve(plugin);
            }
            if (!pluginDir) {
                throw new PluginNotFoundError(plugin, await availablePlugins(root, config));
            }

            const strict = options.strict ?? config.strict;
            const report = await validatePlugin(pluginDir, config);

            if (options.json) {
                printJson({ ...report, valid: isValid(report, strict) });
            } else {
                print(formatReport(report, strict));
            }

            if (!isValid(report, strict)) {
                process.exitCode = 1;
            }
        }));
}
