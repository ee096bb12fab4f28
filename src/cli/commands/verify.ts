import { Command } from 'commander';
import { loadContext, runAction } from '../context.js';
import { formatReport, print, printJson } from '../ui/render.js';
import { Spinner } from '../ui/spinner.js';
import { verifyMarketplace } from '../../validation/marketplace-verifier.js';
import { isValid } from '../../validation/report.js';
import { pluralize } from '../../utils/naming.js';
import type { ValidationReport } from '../../validation/types.js';

interface VerifyCommandOptions {
    deep?: boolean;
    strict?: boolean;
    json?: boolean;
}

export function createVerifyCommand(): Command {
    return new Command('verify')
        .description('Verify the marketplace manifest and every plugin it lists')
        .option('--deep', 'Run full plugin validation for each listed plugin')
        .option('--strict', 'Treat warnings as errors')
        .option('--json', 'Print the report as JSON')
        .action(runAction(async (options: VerifyCommandOptions, command: Command) => {
            const { root, config } = await loadContext(command);
            const strict = options.strict ?? config.strict;

            const spinner = new Spinner(!options.json && Boolean(process.stderr.isTTY));
            spinner.start('Verifying marketplace...');

            let report: ValidationReport;
            try {
                report = await verifyMarketplace(root, config, {
                    deep: options.deep,
                    onPlugin: (name) => spinner.update(`Checking ${name}...`),
                });
            } catch (err) {
                spinner.fail('Verification failed');
                throw err;
            }
            spinner.success(`Checked ${pluralize(report.totalPlugins ?? 0, 'plugin')}`);

            if (options.json) {
                printJson({ ...report, valid: isValid(report, strict) });
            } else {
                print(formatReport(report, strict));
                if (isValid(report, strict)) {
                    console.log('');
                    console.log('To use the marketplace:');
                    console.log('  1. Add this marketplace to your assistant');
                    console.log('  2. Run: /plugin');
                    console.log('  3. Browse and install plugins');
                }
            }

            if (!isValid(report, strict)) {
                process.exitCode = 1;
            }
        }));
}
