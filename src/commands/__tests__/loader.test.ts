import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import { CommandLoader } from '../loader.js';
import { makeTempDir, removeDir, writeTree } from '../../test-utils/fixtures.js';

describe('CommandLoader', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('loads definitions sorted by file name', async () => {
        await writeTree(dir, {
            'commands/review.md': '---\ndescription: Review the diff\ntools: Read, Grep\n---\nCheck everything.\n',
            'commands/deploy.md': '# Deploy\n\nShip the current branch.\n',
            'commands/notes.txt': 'ignored',
        });

        const loader = new CommandLoader();
        const defs = await loader.loadFromDirectory(path.join(dir, 'commands'), 'demo', 'command');

        expect(defs.map((def) => def.name)).toEqual(['deploy', 'review']);
        expect(defs[0].description).toBe('Ship the current branch.');
        expect(defs[1].description).toBe('Review the diff');
        expect(defs[1].tools).toEqual(['Read', 'Grep']);
        expect(defs[1].prompt).toBe('Check everything.');
        expect(defs[1].source).toBe('demo');
    });

    it('prefers the frontmatter name for agents', async () => {
        await writeTree(dir, {
            'agents/reviewer.md': '---\nname: senior-reviewer\n---\n# Reviewer\n',
        });

        const loader = new CommandLoader();
        const agents = await loader.loadFromDirectory(path.join(dir, 'agents'), 'demo', 'agent');

        expect(agents).toHaveLength(1);
        expect(agents[0].kind).toBe('agent');
        expect(agents[0].name).toBe('senior-reviewer');
        expect(agents[0].description).toBe('Agent: senior-reviewer');
    });

    it('skips files with malformed frontmatter', async () => {
        await writeTree(dir, {
            'commands/bad.md': '---\n- a\n---\nBody',
            'commands/good.md': 'Do the thing.',
        });

        const defs = await new CommandLoader().loadFromDirectory(path.join(dir, 'commands'), 'demo');

        expect(defs.map((def) => def.name)).toEqual(['good']);
    });

    it('returns nothing for a missing directory', async () => {
        const defs = await new CommandLoader().loadFromDirectory(path.join(dir, 'absent'), 'demo');
        expect(defs).toEqual([]);
    });
});
