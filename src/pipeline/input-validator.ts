/**
 * Input Validator
 *
 * Checks that both day records are present and that every required field is a
 * finite, non-negative number. Collects all problems before failing.
 */

import { z } from 'zod';
import type { DailyData } from '../types/index.js';
import { ValidationError, toValidationIssues, type ValidationIssue } from '../core/errors.js';

const amount = z
    .number({ required_error: 'is required', invalid_type_error: 'must be a number' })
    .finite({ message: 'must be a finite number' })
    .nonnegative({ message: 'must not be negative' });

export const DailyRecordSchema = z.object(
    {
        sales: amount,
        costs: amount,
        customers: amount.int({ message: 'must be a whole number' }),
    },
    { required_error: 'is required', invalid_type_error: 'must be an object' }
);

export const DailyDataSchema = z.object(
    {
        today: DailyRecordSchema,
        yesterday: DailyRecordSchema,
    },
    { required_error: 'is required', invalid_type_error: 'must be an object' }
);

/** Every problem with the raw input, or an empty list when it is valid */
export function collectInputIssues(input: unknown): ValidationIssue[] {
    const parsed = DailyDataSchema.safeParse(input);
    return parsed.success ? [] : toValidationIssues(parsed.error);
}

/**
 * Validate raw input into a today/yesterday pair
 * @throws ValidationError listing every missing or malformed field
 */
export function validateDailyData(input: unknown): DailyData {
    const parsed = DailyDataSchema.safeParse(input);
    if (!parsed.success) {
        throw new ValidationError(toValidationIssues(parsed.error));
    }
    return parsed.data;
}
