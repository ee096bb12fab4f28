import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Spinner wrapper for consistent UX across the CLI.
 *
 * Draws on stderr and only when enabled, so piped or `--json` output
 * stays clean.
 */
export class Spinner {
    private spinner: Ora;

    constructor(enabled = Boolean(process.stderr.isTTY), stream: NodeJS.WritableStream = process.stderr) {
        // ora still prints plain status lines when only `isEnabled` is off
        this.spinner = ora({
            color: 'cyan',
            spinner: 'dots',
            stream,
            isEnabled: enabled,
            isSilent: !enabled,
        });
    }

    start(message: string): void {
        this.spinner.start(chalk.dim(`  ${message}`));
    }

    update(message: string): void {
        this.spinner.text = chalk.dim(`  ${message}`);
    }

    success(message: string): void {
        this.spinner.succeed(chalk.green(`  ${message}`));
    }

    fail(message: string): void {
        this.spinner.fail(chalk.red(`  ${message}`));
    }
}
