/**
 * Type definitions for the daily business report
 * Core interfaces shared by the pipeline stages and the API
 */

// ============================================
// INPUT TYPES
// ============================================

/** One day's snapshot of the business */
export interface DailyRecord {
    sales: number;
    costs: number;
    /** New customers acquired that day */
    customers: number;
}

export interface DailyData {
    today: DailyRecord;
    yesterday: DailyRecord;
}

// ============================================
// METRIC TYPES
// ============================================

/**
 * A derived value that may be undefined because its divisor was zero.
 * Rules treat an undefined metric as "no signal".
 */
export type MetricValue =
    | { status: 'computed'; value: number }
    | { status: 'undefined'; reason: 'zero_base' };

export interface MetricsBundle {
    profitToday: number;
    profitYesterday: number;

    /** Customer acquisition cost (costs / customers) */
    cacToday: MetricValue;
    cacYesterday: MetricValue;

    /** Day-over-day change, in percent */
    salesChangePct: MetricValue;
    costsChangePct: MetricValue;
}

// ============================================
// OUTPUT TYPES
// ============================================

export interface ReportOutput {
    profitStatus: string;
    alerts: string[];
    recommendations: string[];
}

export interface ReportThresholds {
    /** CAC above this amount raises a "high CAC" alert */
    cacCeiling: number;
    /** Day-over-day CAC increase (percent) that raises an alert */
    cacIncreasePct: number;
    /** Sales growth (percent) that suggests a bigger advertising budget */
    salesGrowthPct: number;
    /** Day-over-day cost increase (percent) that raises a "rising costs" alert */
    costIncreasePct: number;
}

// ============================================
// PIPELINE TYPES
// ============================================

export type StageId = 'input' | 'processing' | 'recommendation';

export interface ReportState {
    /** Raw input until the input stage has validated it */
    data: unknown;
    validated: DailyData | null;
    metrics: MetricsBundle | null;
    report: ReportOutput | null;
}

export type StageStatus = 'complete' | 'error';
