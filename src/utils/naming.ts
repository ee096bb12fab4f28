/** Lowercase words joined by single hyphens, starting with a letter */
export const KEBAB_CASE = /^[a-z][a-z0-9]*(-[a-z0-9]+)*$/;

/** Plain `major.minor.patch` */
export const VERSION_FORMAT = /^\d+\.\d+\.\d+$/;

export function isKebabCase(name: string): boolean {
    return KEBAB_CASE.test(name);
}

export function isVersion(version: string): boolean {
    return VERSION_FORMAT.test(version);
}

/**
 * Title-case a kebab-case name ("rails-workflow" → "Rails Workflow")
 */
export function toTitle(name: string): string {
    return name
        .split('-')
        .filter(Boolean)
        .map((word) => word[0].toUpperCase() + word.slice(1))
        .join(' ');
}

export function pluralize(count: number, noun: string): string {
    return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
