import { describe, it, expect } from 'vitest';
import { PluginBuilder, generateCommandContent, generateAgentContent } from '../builder.js';
import { parseFrontmatter } from '../../commands/frontmatter.js';
import { ScaffoldError } from '../../errors.js';

const metadata = {
    name: 'rails-workflow',
    version: '0.1.0',
    description: 'Rails helpers',
    author: { name: 'Test Author' },
    keywords: ['rails'],
};

describe('PluginBuilder', () => {
    it('requires metadata', () => {
        expect(() => new PluginBuilder().build()).toThrow(ScaffoldError);
        expect(() => new PluginBuilder().build()).toThrow('Plugin metadata is required');
    });

    it('collects commands and agents into files', () => {
        const builder = new PluginBuilder()
            .withMetadata(metadata)
            .addCommand({ name: 'migrate', description: 'Run migrations', prompt: 'Run them.' })
            .addAgent({ name: 'reviewer', description: 'Reviews code', instructions: 'Review.' });

        const config = builder.build();

        expect(config.metadata).toBe(metadata);
        expect(config.commands).toHaveLength(1);
        expect(Array.from(builder.generateCommandFiles().keys())).toEqual(['commands/migrate.md']);
        expect(Array.from(builder.generateAgentFiles().keys())).toEqual(['agents/reviewer.md']);
    });
});

describe('generateCommandContent', () => {
    it('writes title, description and prompt', () => {
        expect(generateCommandContent({ name: 'migrate', description: 'Run migrations', prompt: 'Run them.' }))
            .toBe('# migrate\n\nRun migrations\n\n---\n\nRun them.\n');
    });
});

describe('generateAgentContent', () => {
    it('writes parseable frontmatter with tools and examples', () => {
        const content = generateAgentContent({
            name: 'reviewer',
            description: 'Reviews code',
            instructions: 'Review every diff.',
            tools: ['Read', 'Grep'],
            examples: [{
                context: 'A pull request is open',
                userMessage: 'Review this',
                assistantResponse: 'Reviewing now',
                commentary: 'Use the reviewer for diffs',
            }],
        });

        const { frontmatter, body, error } = parseFrontmatter(content);

        expect(error).toBeUndefined();
        expect(frontmatter).toEqual({ name: 'reviewer', description: 'Reviews code', tools: 'Read, Grep' });
        expect(body).toContain('## Instructions\n\nReview every diff.\n');
        expect(body).toContain('## Available Tools\n\n- Read\n- Grep\n');
        expect(body).toContain('<example>\nContext: A pull request is open\nuser: "Review this"\n');
    });

    it('omits tools and examples when there are none', () => {
        const content = generateAgentContent({ name: 'helper', description: 'Helps', instructions: 'Help.' });

        expect(content).toBe('---\nname: helper\ndescription: Helps\n---\n\n# helper\n\nHelps\n\n## Instructions\n\nHelp.\n\n');
    });
});
