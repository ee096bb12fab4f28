import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { formatReport, formatCheck, formatPluginList, formatHooks } from '../render.js';
import type { ValidationReport } from '../../../validation/types.js';

const report: ValidationReport = {
    kind: 'plugin',
    target: 'demo',
    path: '/plugins/demo',
    sections: [
        {
            title: 'Structure',
            checks: [
                { severity: 'pass', message: 'package.json exists' },
                { severity: 'warning', message: 'plugin.json has no keywords' },
            ],
        },
    ],
    errors: 0,
    warnings: 1,
};

describe('render', () => {
    beforeAll(() => {
        chalk.level = 0;
    });

    it('formats checks with severity icons', () => {
        expect(formatCheck({ severity: 'pass', message: 'ok' })).toBe('  ✓ ok');
        expect(formatCheck({ severity: 'warning', message: 'hmm' })).toBe('  ⚠ hmm');
        expect(formatCheck({ severity: 'error', message: 'bad' })).toBe('  ✗ bad');
    });

    it('formats a plugin report', () => {
        expect(formatReport(report)).toEqual([
            'Validating plugin: demo',
            '==================================',
            '',
            'Structure',
            '  ✓ package.json exists',
            '  ⚠ plugin.json has no keywords',
            '',
            '==================================',
            'Validation complete!',
            '',
            'Errors: 0',
            'Warnings: 1',
            '',
            '✓ Plugin is valid!',
        ]);
    });

    it('fails warnings in strict mode', () => {
        const lines = formatReport(report, true);
        expect(lines[lines.length - 1]).toBe('✗ Warnings are treated as errors in strict mode');
    });

    it('summarizes a marketplace report', () => {
        const lines = formatReport({
            ...report,
            kind: 'marketplace',
            target: 'team-market',
            errors: 2,
            totalPlugins: 3,
        });

        expect(lines[0]).toBe('Marketplace verification: team-market');
        expect(lines).toContain('Verification complete!');
        expect(lines).toContain('Total plugins: 3');
        expect(lines[lines.length - 1]).toBe('✗ Please fix errors before using the marketplace');
    });

    it('lists plugins with their counts', () => {
        expect(formatPluginList([{
            name: 'demo', id: 'demo', path: 'plugins/demo', description: 'Demo plugin',
            version: '1.0.0', commands: 2, agents: 1, skills: 0,
        }])).toEqual([
            'Available plugins (1)',
            '',
            '  demo v1.0.0',
            '    Demo plugin',
            '    2 commands, 1 agent',
            '',
        ]);
    });

    it('groups hooks by event', () => {
        expect(formatHooks([
            { event: 'PreToolUse', type: 'command', command: 'fmt.sh', matcher: 'Write', timeout: 30, source: 'demo', pluginRoot: '/p' },
            { event: 'Stop', type: 'command', command: 'bye.sh', source: 'demo', pluginRoot: '/p' },
        ])).toEqual([
            '  PreToolUse',
            '    → fmt.sh [match: Write] (30s)',
            '',
            '  Stop',
            '    → bye.sh',
            '',
        ]);
    });
});
