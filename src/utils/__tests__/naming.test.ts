import { describe, it, expect } from 'vitest';
import { isKebabCase, isVersion, toTitle, pluralize } from '../naming.js';

describe('isKebabCase', () => {
    it('accepts lowercase words joined by single hyphens', () => {
        expect(isKebabCase('rails-workflow')).toBe(true);
        expect(isKebabCase('code-review2')).toBe(true);
        expect(isKebabCase('lint')).toBe(true);
    });

    it('rejects other shapes', () => {
        expect(isKebabCase('Rails-Workflow')).toBe(false);
        expect(isKebabCase('rails_workflow')).toBe(false);
        expect(isKebabCase('rails--workflow')).toBe(false);
        expect(isKebabCase('-rails')).toBe(false);
        expect(isKebabCase('rails-')).toBe(false);
        expect(isKebabCase('2fast')).toBe(false);
        expect(isKebabCase('')).toBe(false);
    });
});

describe('isVersion', () => {
    it('requires major.minor.patch', () => {
        expect(isVersion('1.0.0')).toBe(true);
        expect(isVersion('10.20.30')).toBe(true);
        expect(isVersion('1.0')).toBe(false);
        expect(isVersion('v1.0.0')).toBe(false);
        expect(isVersion('1.0.0-beta')).toBe(false);
    });
});

describe('toTitle', () => {
    it('title-cases each segment', () => {
        expect(toTitle('rails-workflow')).toBe('Rails Workflow');
        expect(toTitle('lint')).toBe('Lint');
    });
});

describe('pluralize', () => {
    it('adds an s except for one', () => {
        expect(pluralize(0, 'command')).toBe('0 commands');
        expect(pluralize(1, 'command')).toBe('1 command');
        expect(pluralize(3, 'hook command')).toBe('3 hook commands');
    });
});
