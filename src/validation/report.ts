import type { Check, ReportSection, Severity, ValidationReport } from './types.js';

/**
 * Collects checks for one heading of a report
 */
export class SectionBuilder {
    readonly checks: Check[] = [];

    constructor(readonly title: string) {}

    pass(message: string, file?: string): void {
        this.add('pass', message, file);
    }

    warn(message: string, file?: string): void {
        this.add('warning', message, file);
    }

    error(message: string, file?: string): void {
        this.add('error', message, file);
    }

    add(severity: Severity, message: string, file?: string): void {
        this.checks.push(file ? { severity, message, file } : { severity, message });
    }

    /** Append checks gathered elsewhere */
    merge(checks: Check[]): void {
        this.checks.push(...checks);
    }

    count(severity: Severity): number {
        return this.checks.filter((check) => check.severity === severity).length;
    }
}

export class ReportBuilder {
    private sections: SectionBuilder[] = [];

    constructor(
        private kind: ValidationReport['kind'],
        private target: string,
        private path: string
    ) {}

    section(title: string): SectionBuilder {
        const existing = this.sections.find((s) => s.title === title);
        if (existing) return existing;

        const section = new SectionBuilder(title);
        this.sections.push(section);
        return section;
    }

    setTarget(target: string): void {
        this.target = target;
    }

    build(extra: Pick<ValidationReport, 'totalPlugins'> = {}): ValidationReport {
        const sections: ReportSection[] = this.sections
            .filter((s) => s.checks.length > 0)
            .map((s) => ({ title: s.title, checks: [...s.checks] }));

        let errors = 0;
        let warnings = 0;
        for (const section of sections) {
            for (const check of section.checks) {
                if (check.severity === 'error') errors++;
                if (check.severity === 'warning') warnings++;
            }
        }

        return {
            kind: this.kind,
            target: this.target,
            path: this.path,
            sections,
            errors,
            warnings,
            ...extra,
        };
    }
}

/**
 * A report passes with no errors; strict mode also rejects warnings
 */
export function isValid(report: ValidationReport, strict = false): boolean {
    return report.errors === 0 && (!strict || report.warnings === 0);
}

export function allChecks(report: ValidationReport): Check[] {
    return report.sections.flatMap((section) => section.checks);
}
