import type { ZodError, ZodIssue } from 'zod';

/**
 * Dotted JSON path of an issue (`author.name`, `plugins[2].source`)
 */
export function issuePath(issue: ZodIssue): string {
    let out = '';
    for (const segment of issue.path) {
        if (typeof segment === 'number') {
            out += `[${segment}]`;
        } else {
            out += out ? `.${segment}` : segment;
        }
    }
    return out || '(root)';
}

/**
 * One `path: message` line per issue
 */
export function formatIssues(error: ZodError): string[] {
    return error.issues.map((issue) => `${issuePath(issue)}: ${issue.message}`);
}
