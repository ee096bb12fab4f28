import { Command } from 'commander';
import chalk from 'chalk';
import { loadContext, runAction } from '../context.js';
import { createPlugin } from '../../scaffold/create.js';
import { ScaffoldError } from '../../errors.js';
import { displayPath } from '../../utils/paths.js';

interface CreateOptions {
    description?: string;
    author?: string;
    email?: string;
    pluginVersion: string;
    keywords?: string;
    license?: string;
    command?: string[];
    agent?: string[];
    namespace?: string;
    register?: boolean;
    yes?: boolean;
}

/**
 * Prompt for a required value on a TTY, or fail naming the flag
 */
async function required(value: string | undefined, flag: string, message: string, interactive: boolean): Promise<string> {
    if (value && value.trim() !== '') return value;
    if (!interactive) {
        throw new ScaffoldError(`${flag} is required`);
    }

    const { default: inquirer } = await import('inquirer');
    const answers = await inquirer.prompt<{ value: string }>([
        {
            type: 'input',
            name: 'value',
            message,
            validate: (input: string) => input.trim() !== '' || 'A value is required',
        },
    ]);
    return answers.value.trim();
}

export function createCreateCommand(): Command {
    return new Command('create')
        .description('Scaffold a new plugin')
        .argument('<name>', 'Plugin name (kebab-case)')
        .option('-d, --description <text>', 'Plugin description')
        .option('-a, --author <name>', 'Author name')
        .option('-e, --email <email>', 'Author email')
        .option('-v, --plugin-version <version>', 'Initial version', '0.1.0')
        .option('-k, --keywords <list>', 'Comma-separated keywords')
        .option('-l, --license <id>', 'License identifier')
        .option('-c, --command <names...>', 'Commands to create')
        .option('--agent <names...>', 'Agents to create')
        .option('-n, --namespace <namespace>', 'Create under plugins/<namespace>/')
        .option('-r, --register', 'Add the plugin to the marketplace manifest')
        .option('-y, --yes', 'Never prompt; fail when a required value is missing')
        .action(runAction(async (name: string, options: CreateOptions, command: Command) => {
            const { root, config } = await loadContext(command);
            const interactive = !options.yes && Boolean(process.stdin.isTTY);

            const description = await required(options.description, '--description', 'Plugin description:', interactive);
            const authorName = await required(options.author, '--author', 'Author name:', interactive);

            const result = await createPlugin(root, {
                name,
                description,
                author: options.email ? { name: authorName, email: options.email } : { name: authorName },
                version: options.pluginVersion,
                keywords: options.keywords?.split(',').map((k) => k.trim()).filter(Boolean),
                license: options.license,
                namespace: options.namespace,
                commands: options.command,
                agents: options.agent,
                register: options.register,
            }, config);

            console.log(chalk.green(`✓ Created plugin ${chalk.bold(name)} in ${displayPath(result.dir, root)}`));
            for (const file of result.files) {
                console.log(chalk.dim(`  + ${file}`));
            }
            if (result.marketplacePath) {
                console.log(chalk.green(`✓ Registered in ${displayPath(result.marketplacePath, root)}`));
            }
            console.log();
            console.log(chalk.dim(`  Next: ${chalk.white(`plugin-market validate ${name}`)}`));
        }));
}
