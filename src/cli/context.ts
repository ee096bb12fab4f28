import path from 'node:path';
import chalk from 'chalk';
import type { Command } from 'commander';
import type { MarketConfig } from '../config/schema.js';
import { ConfigLoader } from '../config/loader.js';
import { getLogger } from '../utils/logger.js';
import { PluginMarketError, PluginNotFoundError, ManifestError, errorMessage } from '../errors.js';

export interface CliContext {
    /** Absolute marketplace root */
    root: string;
    config: MarketConfig;
}

type GlobalOptions = {
    root?: string;
    config?: string;
    verbose?: boolean;
};

/**
 * Resolve `--root` and `--config`, load configuration and apply the log level
 */
export async function loadContext(command: Command): Promise<CliContext> {
    const globals: GlobalOptions = command.optsWithGlobals();
    const root = path.resolve(globals.root ?? process.cwd());
    const config = await new ConfigLoader().load(root, globals.config);

    getLogger().setLevel(globals.verbose ? 'debug' : config.logLevel);
    return { root, config };
}

/**
 * Wrap a command action: domain errors are printed in red and set exit code 1
 */
export function runAction<Args extends unknown[]>(
    action: (...args: Args) => Promise<void>
): (...args: Args) => Promise<void> {
    return async (...args: Args) => {
        try {
            await action(...args);
        } catch (err) {
            reportError(err);
            process.exitCode = 1;
        }
    };
}

export function reportError(err: unknown): void {
    if (!(err instanceof PluginMarketError)) {
        console.error(chalk.red(`Unexpected error: ${errorMessage(err)}`));
        getLogger().debug('Stack', { stack: err instanceof Error ? err.stack : undefined });
        return;
    }

    console.error(chalk.red(`Error: ${err.message}`));

    if (err instanceof ManifestError) {
        console.error(chalk.dim(`  in ${err.file}`));
    }
    if (err instanceof PluginNotFoundError) {
        printAvailable(err.available, console.error);
    }
}

export function printAvailable(names: string[], write: (line: string) => void = console.log): void {
    write('');
    write('Available plugins:');
    if (names.length === 0) {
        write(chalk.dim('  (none)'));
    }
    for (const name of names) {
        write(`  ${name}`);
    }
}
