/**
 * Threshold Configuration
 *
 * Thresholds are read from the environment once and passed explicitly to the
 * pipeline; requests may override individual values.
 */

import { z } from 'zod';
import type { ReportThresholds } from '../types/index.js';
import { ConfigError, toValidationIssues } from './errors.js';

export const DEFAULT_THRESHOLDS: Readonly<ReportThresholds> = Object.freeze({
    cacCeiling: 50,
    cacIncreasePct: 20,
    salesGrowthPct: 10,
    costIncreasePct: 15,
});

// Blank variables count as unset
const envNumber = (fallback: number) =>
    z.preprocess(
        value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
        z.coerce
            .number({ invalid_type_error: 'must be a number' })
            .finite({ message: 'must be a finite number' })
            .nonnegative({ message: 'must not be negative' })
            .default(fallback)
    );

const ThresholdEnvSchema = z.object({
    CAC_CEILING: envNumber(DEFAULT_THRESHOLDS.cacCeiling),
    CAC_INCREASE_ALERT_PCT: envNumber(DEFAULT_THRESHOLDS.cacIncreasePct),
    SALES_GROWTH_ALERT_PCT: envNumber(DEFAULT_THRESHOLDS.salesGrowthPct),
    COST_INCREASE_ALERT_PCT: envNumber(DEFAULT_THRESHOLDS.costIncreasePct),
});

const overrideNumber = z
    .number({ invalid_type_error: 'must be a number' })
    .finite({ message: 'must be a finite number' })
    .nonnegative({ message: 'must not be negative' })
    .optional();

const ThresholdOverrideSchema = z.object(
    {
        cacCeiling: overrideNumber,
        cacIncreasePct: overrideNumber,
        salesGrowthPct: overrideNumber,
        costIncreasePct: overrideNumber,
    },
    { invalid_type_error: 'must be an object' }
);

export type ThresholdOverride = z.infer<typeof ThresholdOverrideSchema>;

/**
 * Load thresholds from environment variables, falling back to the defaults
 * @throws ConfigError when a variable is set to something other than a non-negative number
 */
export function loadThresholds(env: NodeJS.ProcessEnv = process.env): ReportThresholds {
    const parsed = ThresholdEnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError('threshold configuration', toValidationIssues(parsed.error, 'env'));
    }

    return {
        cacCeiling: parsed.data.CAC_CEILING,
        cacIncreasePct: parsed.data.CAC_INCREASE_ALERT_PCT,
        salesGrowthPct: parsed.data.SALES_GROWTH_ALERT_PCT,
        costIncreasePct: parsed.data.COST_INCREASE_ALERT_PCT,
    };
}

/**
 * Merge a caller-supplied partial override over the base thresholds
 */
export function resolveThresholds(override: unknown, base: ReportThresholds = DEFAULT_THRESHOLDS): ReportThresholds {
    if (override === undefined) {
        return { ...base };
    }

    const parsed = ThresholdOverrideSchema.safeParse(override);
    if (!parsed.success) {
        const issues = toValidationIssues(parsed.error, 'thresholds').map(issue => ({
            ...issue,
            path: issue.path === 'thresholds' ? issue.path : `thresholds.${issue.path}`,
        }));
        throw new ConfigError('threshold override', issues);
    }

    return {
        cacCeiling: parsed.data.cacCeiling ?? base.cacCeiling,
        cacIncreasePct: parsed.data.cacIncreasePct ?? base.cacIncreasePct,
        salesGrowthPct: parsed.data.salesGrowthPct ?? base.salesGrowthPct,
        costIncreasePct: parsed.data.costIncreasePct ?? base.costIncreasePct,
    };
}

export function resolvePort(env: NodeJS.ProcessEnv = process.env): number {
    const port = Number(env.PORT);
    return Number.isInteger(port) && port > 0 ? port : 3000;
}
