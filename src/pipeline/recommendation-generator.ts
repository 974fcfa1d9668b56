/**
 * Recommendation Generator
 *
 * Maps a metrics bundle to a profit status line plus alerts and
 * recommendations, using fixed threshold rules.
 */

import type {
    DailyRecord,
    MetricValue,
    MetricsBundle,
    ReportOutput,
    ReportThresholds,
} from '../types/index.js';

// ============================================
// RULE TYPES
// ============================================

export interface RuleContext {
    metrics: MetricsBundle;
    yesterday: DailyRecord;
    thresholds: ReportThresholds;
}

export interface RuleFinding {
    alerts?: string[];
    recommendations?: string[];
}

export interface ReportRule {
    id: string;
    description: string;
    evaluate(context: RuleContext): RuleFinding | null;
}

// ============================================
// FORMATTING
// ============================================

// Rules compare amounts and percentages at the two decimals they print
const roundToCents = (value: number): number => Math.round(value * 100) / 100;

export const roundMoney = roundToCents;

export const roundPct = roundToCents;

export const formatMoney = (amount: number): string => `$${Math.abs(roundMoney(amount)).toFixed(2)}`;

export const formatPercent = (pct: number): string => `${roundPct(pct).toFixed(2)}%`;

export function formatProfitStatus(profit: number): string {
    return roundMoney(profit) >= 0 ? `Profit: ${formatMoney(profit)}` : `Loss: ${formatMoney(profit)}`;
}

function readMetric(metric: MetricValue): number | null {
    return metric.status === 'computed' ? metric.value : null;
}

// ============================================
// RULES (evaluated in this order)
// ============================================

const negativeProfitRule: ReportRule = {
    id: 'negative_profit',
    description: 'Today closed at a loss',
    evaluate: ({ metrics }) => {
        if (roundMoney(metrics.profitToday) >= 0) return null;
        return {
            alerts: [`Negative profit: lost ${formatMoney(metrics.profitToday)} today.`],
            recommendations: ['Reduce costs to improve profitability'],
        };
    },
};

const highCacRule: ReportRule = {
    id: 'high_cac',
    description: 'CAC is above the configured ceiling',
    evaluate: ({ metrics, thresholds }) => {
        const cac = readMetric(metrics.cacToday);
        if (cac === null || roundMoney(cac) <= thresholds.cacCeiling) return null;
        return {
            alerts: [
                `High CAC: ${formatMoney(cac)} per customer exceeds the ${formatMoney(thresholds.cacCeiling)} ceiling.`,
            ],
        };
    },
};

const cacIncreaseRule: ReportRule = {
    id: 'cac_increase',
    description: 'CAC grew faster than the configured percentage since yesterday',
    evaluate: ({ metrics, thresholds }) => {
        const cacToday = readMetric(metrics.cacToday);
        const cacYesterday = readMetric(metrics.cacYesterday);
        if (cacToday === null || cacYesterday === null || cacYesterday === 0) return null;

        const change = ((cacToday - cacYesterday) / cacYesterday) * 100;
        if (roundPct(change) <= thresholds.cacIncreasePct) return null;
        return {
            alerts: [`CAC increased by ${formatPercent(change)}, which is significant.`],
            recommendations: ['Review marketing campaigns for efficiency'],
        };
    },
};

const salesGrowthRule: ReportRule = {
    id: 'sales_growth',
    description: 'Sales grew faster than the configured percentage',
    evaluate: ({ metrics, thresholds }) => {
        const change = readMetric(metrics.salesChangePct);
        if (change === null || roundPct(change) <= thresholds.salesGrowthPct) return null;
        return {
            recommendations: [
                `Consider increasing advertising budget due to ${formatPercent(change)} sales growth`,
            ],
        };
    },
};

const risingCostsRule: ReportRule = {
    id: 'rising_costs',
    description: 'Costs grew faster than the configured percentage',
    evaluate: ({ metrics, yesterday, thresholds }) => {
        const change = readMetric(metrics.costsChangePct);
        if (change === null || roundPct(change) <= thresholds.costIncreasePct) return null;
        return {
            alerts: [`Rising costs: up ${formatPercent(change)} from ${formatMoney(yesterday.costs)} yesterday.`],
        };
    },
};

export const REPORT_RULES: readonly ReportRule[] = [
    negativeProfitRule,
    highCacRule,
    cacIncreaseRule,
    salesGrowthRule,
    risingCostsRule,
];

// ============================================
// GENERATOR
// ============================================

export function generateReport(
    metrics: MetricsBundle,
    yesterday: DailyRecord,
    thresholds: ReportThresholds,
    rules: readonly ReportRule[] = REPORT_RULES
): ReportOutput {
    const alerts: string[] = [];
    const recommendations: string[] = [];
    const context: RuleContext = { metrics, yesterday, thresholds };

    for (const rule of rules) {
        const finding = rule.evaluate(context);
        if (!finding) continue;

        alerts.push(...(finding.alerts ?? []));
        recommendations.push(...(finding.recommendations ?? []));
    }

    return {
        profitStatus: formatProfitStatus(metrics.profitToday),
        alerts,
        recommendations,
    };
}
