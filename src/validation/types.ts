/**
 * Validation — report model shared by the plugin validator and the
 * marketplace verifier.
 */

export type Severity = 'pass' | 'warning' | 'error';

export interface Check {
    severity: Severity;
    message: string;
    /** File the check is about, relative to the report's path */
    file?: string;
}

export interface ReportSection {
    title: string;
    checks: Check[];
}

export interface ValidationReport {
    kind: 'plugin' | 'marketplace';
    /** Plugin name, or the marketplace name */
    target: string;
    /** Absolute path of the plugin or marketplace root */
    path: string;
    sections: ReportSection[];
    errors: number;
    warnings: number;
    /** Marketplace reports: plugins listed, or discovered in fallback mode */
    totalPlugins?: number;
}
