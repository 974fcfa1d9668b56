/**
 * Metrics Calculator
 *
 * Derives profit, CAC and day-over-day changes from a validated pair.
 */

import type { DailyData, MetricValue, MetricsBundle } from '../types/index.js';

export const computed = (value: number): MetricValue => ({ status: 'computed', value });

export const UNDEFINED_METRIC: MetricValue = Object.freeze({ status: 'undefined', reason: 'zero_base' });

/** `numerator / denominator`, or undefined when the denominator is zero */
export function safeRatio(numerator: number, denominator: number): MetricValue {
    if (denominator === 0) {
        return UNDEFINED_METRIC;
    }
    return computed(numerator / denominator);
}

/** Percentage change from `base` to `current`; undefined when `base` is zero */
export function percentChange(current: number, base: number): MetricValue {
    if (base === 0) {
        return UNDEFINED_METRIC;
    }
    return computed(((current - base) / base) * 100);
}

export function calculateMetrics(data: DailyData): MetricsBundle {
    const { today, yesterday } = data;

    return {
        profitToday: today.sales - today.costs,
        profitYesterday: yesterday.sales - yesterday.costs,
        cacToday: safeRatio(today.costs, today.customers),
        cacYesterday: safeRatio(yesterday.costs, yesterday.customers),
        salesChangePct: percentChange(today.sales, yesterday.sales),
        costsChangePct: percentChange(today.costs, yesterday.costs),
    };
}
