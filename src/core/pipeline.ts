/**
 * Report Pipeline
 *
 * Runs input → processing → recommendation over a shared report state.
 * Synchronous and stateless between runs.
 */

import type {
    MetricsBundle,
    ReportOutput,
    ReportState,
    ReportThresholds,
    StageId,
} from '../types/index.js';
import { DEFAULT_THRESHOLDS } from './config.js';
import { PipelineError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { RunTrace } from './run-trace.js';
import { validateDailyData } from '../pipeline/input-validator.js';
import { calculateMetrics } from '../pipeline/metrics-calculator.js';
import { generateReport } from '../pipeline/recommendation-generator.js';

// ============================================
// STAGE INTERFACE
// ============================================

export interface PipelineStage {
    id: StageId;
    name: string;

    /**
     * Produce the next state. Must not mutate the incoming state.
     */
    execute(state: ReportState, thresholds: ReportThresholds): ReportState;
}

export const inputStage: PipelineStage = {
    id: 'input',
    name: 'Input Validator',
    execute: state => ({ ...state, validated: validateDailyData(state.data) }),
};

export const processingStage: PipelineStage = {
    id: 'processing',
    name: 'Metrics Calculator',
    execute: state => {
        if (!state.validated) {
            throw new PipelineError('processing stage requires validated input');
        }
        return { ...state, metrics: calculateMetrics(state.validated) };
    },
};

export const recommendationStage: PipelineStage = {
    id: 'recommendation',
    name: 'Recommendation Generator',
    execute: (state, thresholds) => {
        if (!state.validated || !state.metrics) {
            throw new PipelineError('recommendation stage requires validated input and metrics');
        }
        return {
            ...state,
            report: generateReport(state.metrics, state.validated.yesterday, thresholds),
        };
    },
};

export const DEFAULT_STAGES: readonly PipelineStage[] = [inputStage, processingStage, recommendationStage];

// ============================================
// PIPELINE
// ============================================

export interface PipelineResult {
    runId: string;
    report: ReportOutput;
    metrics: MetricsBundle;
    trace: RunTrace;
}

export class ReportPipeline {
    private readonly thresholds: ReportThresholds;
    private readonly stages: readonly PipelineStage[];
    private readonly logger: Logger;

    constructor(
        thresholds: ReportThresholds = DEFAULT_THRESHOLDS,
        stages: readonly PipelineStage[] = DEFAULT_STAGES,
        logger: Logger = createLogger('Pipeline')
    ) {
        this.thresholds = { ...thresholds };
        this.stages = stages;
        this.logger = logger;
    }

    getThresholds(): ReportThresholds {
        return { ...this.thresholds };
    }

    /**
     * Run every stage in order
     * @throws ValidationError when the input is malformed; no later stage runs
     */
    run(input: unknown, thresholds: ReportThresholds = this.thresholds): PipelineResult {
        const trace = new RunTrace();
        let state: ReportState = { data: input, validated: null, metrics: null, report: null };

        for (const stage of this.stages) {
            state = this.runStage(stage, state, thresholds, trace);
        }

        if (!state.metrics || !state.report) {
            throw new PipelineError('pipeline finished without producing a report');
        }

        this.logger.info(
            `run ${trace.runId} complete in ${trace.totalDurationMs.toFixed(2)}ms ` +
            `(${state.report.alerts.length} alerts, ${state.report.recommendations.length} recommendations)`
        );

        return { runId: trace.runId, report: state.report, metrics: state.metrics, trace };
    }

    private runStage(
        stage: PipelineStage,
        state: ReportState,
        thresholds: ReportThresholds,
        trace: RunTrace
    ): ReportState {
        const startedAt = new Date();
        const start = performance.now();

        try {
            const next = stage.execute(state, thresholds);
            trace.record({ stage: stage.id, status: 'complete', startedAt, durationMs: performance.now() - start });
            this.logger.debug(`${stage.name} complete`);
            return next;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            trace.record({ stage: stage.id, status: 'error', startedAt, durationMs: performance.now() - start, error: message });
            this.logger.warn(`run ${trace.runId} failed at ${stage.id}: ${message}`);
            throw error;
        }
    }
}

/**
 * Run the pipeline once and return only the report
 */
export function runReport(input: unknown, thresholds: ReportThresholds = DEFAULT_THRESHOLDS): ReportOutput {
    return new ReportPipeline(thresholds).run(input).report;
}
