import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { validatePlugin, SECTION_STRUCTURE, SECTION_MARKDOWN, SECTION_SKILLS, SECTION_HOOKS } from '../plugin-validator.js';
import { isValid } from '../report.js';
import type { Severity, ValidationReport } from '../types.js';
import {
    makeTempDir, removeDir, writeTree, makeExecutable, testConfig, validPlugin,
} from '../../test-utils/fixtures.js';

function messages(report: ValidationReport, title: string, severity?: Severity): string[] {
    const section = report.sections.find((s) => s.title === title);
    return (section?.checks ?? [])
        .filter((check) => !severity || check.severity === severity)
        .map((check) => check.message);
}

describe('validatePlugin', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('passes a complete plugin with no warnings', async () => {
        await writeTree(dir, validPlugin('demo'));

        const report = await validatePlugin(dir, testConfig());

        expect(report.kind).toBe('plugin');
        expect(report.target).toBe('demo');
        expect(report.errors).toBe(0);
        expect(report.warnings).toBe(0);
        expect(isValid(report, true)).toBe(true);
        expect(report.sections.map((s) => s.title)).toEqual([SECTION_STRUCTURE, SECTION_MARKDOWN]);
        expect(messages(report, SECTION_STRUCTURE)).toEqual([
            'package.json exists',
            'package.json has name, version and description',
            'README.md exists',
            'README.md has title, installation and usage sections',
            '.claude-plugin directory exists',
            'plugin.json manifest exists',
            'plugin.json is valid JSON',
            'plugin.json has required fields',
            'Found 1 command',
        ]);
        expect(messages(report, SECTION_MARKDOWN)).toEqual(['commands/demo.md has content']);
    });

    it('stops when .claude-plugin is missing', async () => {
        await writeTree(dir, validPlugin('demo', '', { '.claude-plugin/plugin.json': undefined }));
        await writeTree(dir, { 'agents/helper.md': '' });

        const report = await validatePlugin(dir, testConfig());

        expect(report.errors).toBe(1);
        expect(report.sections.map((s) => s.title)).toEqual([SECTION_STRUCTURE]);
        expect(messages(report, SECTION_STRUCTURE, 'error')).toEqual(['.claude-plugin directory is missing']);
    });

    it('reports plugin.json missing inside .claude-plugin', async () => {
        await writeTree(dir, validPlugin('demo', '', { '.claude-plugin/plugin.json': undefined }));
        await mkdir(path.join(dir, '.claude-plugin'));

        const report = await validatePlugin(dir, testConfig());

        expect(messages(report, SECTION_STRUCTURE, 'error')).toEqual(['plugin.json manifest is missing']);
    });

    it('treats a missing package.json as a warning when not required', async () => {
        await writeTree(dir, validPlugin('demo', '', { 'package.json': undefined }));

        const strictPackage = await validatePlugin(dir, testConfig());
        const relaxed = await validatePlugin(dir, testConfig({ requirePackageJson: false }));

        expect(messages(strictPackage, SECTION_STRUCTURE, 'error')).toEqual(['package.json is missing']);
        expect(relaxed.errors).toBe(0);
        expect(messages(relaxed, SECTION_STRUCTURE, 'warning')).toEqual(['package.json is missing']);
    });

    it('reports each package.json field problem', async () => {
        await writeTree(dir, validPlugin('demo', '', { 'package.json': { name: 'demo', version: 'latest' } }));

        const report = await validatePlugin(dir, testConfig());

        expect(messages(report, SECTION_STRUCTURE, 'error')).toEqual([
            'package.json version: must be in major.minor.patch format',
            'package.json description: Required',
        ]);
    });

    it('warns about each missing README section', async () => {
        await writeTree(dir, validPlugin('demo', '', { 'README.md': 'Just some notes.\n' }));

        const report = await validatePlugin(dir, testConfig());

        expect(report.errors).toBe(0);
        expect(messages(report, SECTION_STRUCTURE, 'warning')).toEqual([
            'README.md has no title heading',
            'README.md has no installation instructions',
            'README.md has no usage examples',
        ]);
    });

    it('warns once about a blank README', async () => {
        await writeTree(dir, validPlugin('demo', '', { 'README.md': '  \n' }));

        const report = await validatePlugin(dir, testConfig());

        expect(messages(report, SECTION_STRUCTURE, 'warning')).toEqual(['README.md is empty']);
    });

    it('reports manifest schema issues, naming and keywords', async () => {
        await writeTree(dir, validPlugin('demo', '', {
            '.claude-plugin/plugin.json': { name: 'Demo_Plugin', version: '1.0', author: {} },
        }));

        const report = await validatePlugin(dir, testConfig());

        expect(report.target).toBe('Demo_Plugin');
        expect(messages(report, SECTION_STRUCTURE, 'error')).toEqual([
            'plugin.json description: Required',
            'plugin.json version: must be in major.minor.patch format',
            'plugin.json author.name: Required',
            'Plugin name "Demo_Plugin" should use kebab-case',
        ]);
        expect(messages(report, SECTION_STRUCTURE, 'warning')).toEqual(['plugin.json has no keywords']);
    });

    it('reports invalid manifest JSON', async () => {
        await writeTree(dir, validPlugin('demo', '', { '.claude-plugin/plugin.json': '{ "name": ' }));

        const report = await validatePlugin(dir, testConfig());
        const errors = messages(report, SECTION_STRUCTURE, 'error');

        expect(errors).toHaveLength(1);
        expect(errors[0]).toMatch(/^plugin\.json is invalid JSON: /);
    });

    it('requires at least one command or agent', async () => {
        await writeTree(dir, validPlugin('demo', '', {
            'commands/demo.md': undefined,
            'commands/notes.txt': 'not markdown',
            'skills/guide/SKILL.md': '---\nname: guide\ndescription: A guide\n---\nBody\n',
        }));

        const report = await validatePlugin(dir, testConfig());

        expect(messages(report, SECTION_STRUCTURE, 'error')).toEqual(['Plugin has no commands or agents']);
        expect(messages(report, SECTION_STRUCTURE, 'warning')).toEqual(['commands/notes.txt is not a markdown file']);
        expect(messages(report, SECTION_STRUCTURE, 'pass')).toContain('Found 1 skill');
    });

    it('checks every command and agent file', async () => {
        await writeTree(dir, validPlugin('demo', '', {
            'commands/Bad_Name.md': 'Do the thing.\n',
            'commands/empty.md': '',
            'agents/broken.md': '---\n- a\n- b\n---\nBody\n',
            'agents/plain.md': 'You are a helper.\n',
            'agents/unnamed.md': '---\ndescription: Helps\n---\nYou help.\n',
            'agents/reviewer.md': '---\nname: reviewer\ndescription: Reviews diffs\n---\nYou review.\n',
        }));

        const report = await validatePlugin(dir, testConfig());
        const errors = messages(report, SECTION_MARKDOWN, 'error');
        const warnings = messages(report, SECTION_MARKDOWN, 'warning');

        expect(errors).toHaveLength(3);
        expect(errors).toContain('Command "Bad_Name" should use kebab-case');
        expect(errors).toContain('commands/empty.md is empty');
        expect(errors).toContain('agents/broken.md has invalid frontmatter: frontmatter must be a YAML mapping');
        expect(warnings).toEqual([
            'agents/plain.md has no frontmatter (name, description)',
            'agents/unnamed.md frontmatter has no name',
        ]);
        expect(messages(report, SECTION_MARKDOWN, 'pass')).toContain('agents/reviewer.md has content');
    });

    it('reports an agent whose frontmatter is never closed', async () => {
        await writeTree(dir, validPlugin('demo', '', {
            'agents/rev.md': '---\nname: [unclosed\nYou review code.\n',
        }));

        const report = await validatePlugin(dir, testConfig());

        expect(messages(report, SECTION_MARKDOWN, 'error')).toEqual([
            'agents/rev.md has invalid frontmatter: unterminated frontmatter block',
        ]);
        expect(messages(report, SECTION_MARKDOWN, 'warning')).toEqual([]);
        expect(isValid(report, false)).toBe(false);
    });

    it('checks skill directories', async () => {
        await writeTree(dir, validPlugin('demo', '', {
            'skills/good/SKILL.md': '---\nname: good\ndescription: Good guidance\n---\nBody\n',
            'skills/missing/notes.md': 'no SKILL.md',
            'skills/partial/SKILL.md': '---\nname: partial\n---\nBody\n',
            'skills/bare/SKILL.md': 'No frontmatter at all\n',
            'skills/shouty/SKILL.md': '---\nname: Shouty_Skill\ndescription: Loud\n---\nBody\n',
        }));

        const report = await validatePlugin(dir, testConfig());

        expect(messages(report, SECTION_SKILLS, 'error')).toEqual([
            'skills/bare/SKILL.md has no frontmatter',
            'skills/missing is missing SKILL.md',
            'skills/partial/SKILL.md frontmatter is missing "description"',
        ]);
        expect(messages(report, SECTION_SKILLS, 'warning')).toEqual(['Skill "Shouty_Skill" should use kebab-case']);
        expect(messages(report, SECTION_SKILLS, 'pass')).toEqual([
            'skills/good/SKILL.md is valid',
            'skills/shouty/SKILL.md is valid',
        ]);
    });

    it('accepts well-formed hooks', async () => {
        await writeTree(dir, validPlugin('demo', '', {
            'hooks/hooks.json': {
                hooks: {
                    PostToolUse: [
                        { matcher: 'Write|Edit', hooks: [{ type: 'command', command: '${CLAUDE_PLUGIN_ROOT}/hooks/format.sh', timeout: 30 }] },
                    ],
                },
            },
            'hooks/format.sh': '#!/bin/sh\nset -e\necho formatted\n',
        }));
        await makeExecutable(path.join(dir, 'hooks/format.sh'));

        const report = await validatePlugin(dir, testConfig());

        expect(report.errors).toBe(0);
        expect(report.warnings).toBe(0);
        expect(messages(report, SECTION_HOOKS)).toEqual([
            'hooks.json is valid JSON',
            'Registered 1 hook command',
            'hooks/format.sh is executable',
        ]);
    });

    it('reports hook configuration problems', async () => {
        await writeTree(dir, validPlugin('demo', '', {
            'hooks/hooks.json': {
                hooks: {
                    BeforeEverything: [],
                    Stop: [{ script: 'notify.sh', hooks: [{ type: 'command', command: 'echo done' }] }],
                    SessionStart: { hooks: [] },
                    PreToolUse: [
                        { matcher: 'Bash' },
                        { hooks: [{ type: 'script', command: '${CLAUDE_PLUGIN_ROOT}/hooks/missing.sh' }, { type: 'command' }] },
                    ],
                },
            },
        }));

        const report = await validatePlugin(dir, testConfig());

        expect(messages(report, SECTION_HOOKS, 'error')).toEqual([
            'Invalid hook event: "BeforeEverything"',
            'Stop[0] uses deprecated "script" field',
            'Event "SessionStart" should have an array value',
            'PreToolUse[0] has no "hooks" array',
            'PreToolUse[1].hooks[0] type must be "command"',
            'Script not found: hooks/missing.sh',
            'PreToolUse[1].hooks[1] has no command',
        ]);
        expect(messages(report, SECTION_HOOKS, 'warning')).toEqual([
            'Stop[0].hooks[0] command does not use ${CLAUDE_PLUGIN_ROOT}',
        ]);
    });

    it('accepts events added through configuration', async () => {
        await writeTree(dir, validPlugin('demo', '', {
            'hooks/hooks.json': { hooks: { SubagentStop: [{ hooks: [{ type: 'command', command: 'bash ${CLAUDE_PLUGIN_ROOT}/hooks/stop.sh' }] }] } },
            'hooks/stop.sh': '#!/bin/sh\necho stopped\n',
        }));
        await makeExecutable(path.join(dir, 'hooks/stop.sh'));

        const defaults = await validatePlugin(dir, testConfig());
        const extended = await validatePlugin(dir, testConfig({ hookEvents: ['Stop', 'SubagentStop'] }));

        expect(messages(defaults, SECTION_HOOKS, 'error')).toEqual(['Invalid hook event: "SubagentStop"']);
        expect(extended.errors).toBe(0);
    });

    it('checks hook scripts for permissions, shebang and portability', async () => {
        await writeTree(dir, validPlugin('demo', '', {
            'hooks/hooks.json': {
                hooks: {
                    PreToolUse: [{ hooks: [
                        { type: 'command', command: '${CLAUDE_PLUGIN_ROOT}/hooks/lint.sh' },
                        { type: 'command', command: 'sh ${CLAUDE_PLUGIN_ROOT}/hooks/lint.sh' },
                    ] }],
                },
            },
            'hooks/lint.sh': 'echo linting\nfunction check {\n  [[ -n "$1" ]]\n}\n',
        }));

        const report = await validatePlugin(dir, testConfig());

        expect(messages(report, SECTION_HOOKS, 'error')).toEqual([
            'Script not executable: hooks/lint.sh',
            'hooks/lint.sh is not executable',
            'hooks/lint.sh is missing a shebang',
        ]);
        expect(messages(report, SECTION_HOOKS, 'warning')).toEqual([
            'hooks/lint.sh uses [[ ]] test (not POSIX); use [ ] instead',
            "hooks/lint.sh uses the 'function' keyword (not POSIX)",
        ]);
    });
});
