/**
 * Error taxonomy
 *
 * Division by zero is not an error here: it surfaces as an undefined MetricValue.
 */

import type { ZodError } from 'zod';

export interface ValidationIssue {
    /** Dotted path of the offending field, e.g. `today.sales` */
    path: string;
    message: string;
}

/**
 * Raised when the input is missing a record or a required field, or a field
 * is malformed. Aborts the pipeline.
 */
export class ValidationError extends Error {
    readonly issues: ValidationIssue[];

    constructor(issues: ValidationIssue[]) {
        super(`Invalid input data: ${issues.map(i => `${i.path} ${i.message}`).join('; ')}`);
        this.name = 'ValidationError';
        this.issues = issues;
    }
}

/** Invalid threshold configuration, from the environment or a request override */
export class ConfigError extends Error {
    readonly issues: ValidationIssue[];

    constructor(source: string, issues: ValidationIssue[]) {
        super(`Invalid ${source}: ${issues.map(i => `${i.path} ${i.message}`).join('; ')}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

/** A stage ran before the state it depends on was produced */
export class PipelineError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PipelineError';
    }
}

/** Flatten zod issues into `{ path, message }` pairs */
export function toValidationIssues(error: ZodError, rootLabel = 'input'): ValidationIssue[] {
    return error.issues.map(issue => ({
        path: issue.path.length > 0 ? issue.path.join('.') : rootLabel,
        message: issue.message,
    }));
}
