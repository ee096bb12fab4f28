/**
 * Error hierarchy for the toolkit.
 *
 * Validation never throws for bad plugin content (it records diagnostics);
 * these errors cover what the caller asked for and could not get.
 */
export class PluginMarketError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Configuration file unreadable or failing its schema
 */
export class ConfigError extends PluginMarketError {
    constructor(message: string, readonly issues: string[] = []) {
        super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message);
    }
}

/**
 * A plugin the caller named is not present under the plugins directory
 */
export class PluginNotFoundError extends PluginMarketError {
    constructor(readonly pluginName: string, readonly available: string[]) {
        super(`Plugin '${pluginName}' not found in plugins directory`);
    }
}

/**
 * A manifest the operation depends on is missing or malformed
 */
export class ManifestError extends PluginMarketError {
    constructor(message: string, readonly file: string) {
        super(message);
    }
}

export class ScaffoldError extends PluginMarketError {}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
