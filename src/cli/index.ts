import { Command } from 'commander';
import { createValidateCommand } from './commands/validate.js';
import { createVerifyCommand } from './commands/verify.js';
import { createListCommand } from './commands/list.js';
import { createInfoCommand } from './commands/info.js';
import { createCreateCommand } from './commands/create.js';
import { createHooksCommand } from './commands/hooks.js';

export const VERSION = '0.3.0';

export function createCLI(): Command {
    const program = new Command('plugin-market')
        .description('Validate, verify and scaffold plugin marketplaces')
        .version(VERSION)
        .option('-C, --root <dir>', 'Marketplace root directory (default: current directory)')
        .option('--config <file>', 'Config file (default: plugin-market.config.json in the root)')
        .option('--verbose', 'Log debug output to stderr');

    program.addCommand(createValidateCommand());
    program.addCommand(createVerifyCommand());
    program.addCommand(createListCommand());
    program.addCommand(createInfoCommand());
    program.addCommand(createCreateCommand());
    program.addCommand(createHooksCommand());

    return program;
}
