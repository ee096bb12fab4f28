import { describe, it, expect } from 'vitest';
import { parseFrontmatter, stringField, listField } from '../frontmatter.js';

describe('parseFrontmatter', () => {
    it('splits frontmatter from the body', () => {
        const result = parseFrontmatter('---\nname: reviewer\ndescription: Reviews diffs\n---\nYou review code.\n');

        expect(result.error).toBeUndefined();
        expect(result.frontmatter).toEqual({ name: 'reviewer', description: 'Reviews diffs' });
        expect(result.body).toBe('You review code.\n');
    });

    it('returns null frontmatter when there is no block', () => {
        const result = parseFrontmatter('# Title\n\nBody');

        expect(result.frontmatter).toBeNull();
        expect(result.body).toBe('# Title\n\nBody');
    });

    it('treats an empty block as an empty mapping', () => {
        const result = parseFrontmatter('---\n---\nBody');

        expect(result.frontmatter).toEqual({});
        expect(result.body).toBe('Body');
    });

    it('does not close the block on a dash run inside a line', () => {
        const result = parseFrontmatter('---\ndescription: a --- b\n---\nBody');

        expect(result.frontmatter).toEqual({ description: 'a --- b' });
        expect(result.body).toBe('Body');
    });

    it('reports a block that is not a mapping', () => {
        const result = parseFrontmatter('---\n- one\n- two\n---\nBody');

        expect(result.frontmatter).toBeNull();
        expect(result.error).toBe('frontmatter must be a YAML mapping');
    });

    it('reports YAML syntax errors', () => {
        const result = parseFrontmatter('---\nname: [unclosed\n---\nBody');

        expect(result.frontmatter).toBeNull();
        expect(result.error).toBeDefined();
    });

    it('reports an opening fence that is never closed', () => {
        const result = parseFrontmatter('---\nname: [unclosed\nYou review code.\n');

        expect(result.frontmatter).toBeNull();
        expect(result.error).toBe('unterminated frontmatter block');
    });

    it('treats a dash run later in the file as body text', () => {
        const result = parseFrontmatter('# Title\n---\nMore\n');

        expect(result).toEqual({ frontmatter: null, body: '# Title\n---\nMore\n' });
    });

    it('accepts CRLF line endings', () => {
        const result = parseFrontmatter('---\r\nname: x\r\n---\r\nBody');

        expect(result.frontmatter).toEqual({ name: 'x' });
        expect(result.body).toBe('Body');
    });
});

describe('stringField', () => {
    it('returns trimmed non-empty strings only', () => {
        const fm = { name: '  reviewer ', blank: '  ', count: 3 };

        expect(stringField(fm, 'name')).toBe('reviewer');
        expect(stringField(fm, 'blank')).toBeUndefined();
        expect(stringField(fm, 'count')).toBeUndefined();
        expect(stringField(null, 'name')).toBeUndefined();
    });
});

describe('listField', () => {
    it('accepts YAML lists and comma-separated strings', () => {
        expect(listField({ tools: ['Read', 'Grep', 4] }, 'tools')).toEqual(['Read', 'Grep']);
        expect(listField({ tools: 'Read, Grep,' }, 'tools')).toEqual(['Read', 'Grep']);
        expect(listField({}, 'tools')).toEqual([]);
    });
});
