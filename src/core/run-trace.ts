/**
 * Run Trace
 *
 * Records each stage execution of a pipeline run for diagnostics. The trace is
 * kept apart from the report so identical inputs still give identical reports.
 */

import { v4 as uuid } from 'uuid';
import type { StageId, StageStatus } from '../types/index.js';

// ============================================
// TRACE ENTRY TYPES
// ============================================

export interface StageEntry {
    stage: StageId;
    status: StageStatus;
    startedAt: Date;
    durationMs: number;
    /** Error message when the stage failed */
    error?: string;
}

// ============================================
// RUN TRACE CLASS
// ============================================

export class RunTrace {
    readonly runId: string;
    readonly startedAt: Date;
    private entries: StageEntry[] = [];

    constructor(runId: string = uuid()) {
        this.runId = runId;
        this.startedAt = new Date();
    }

    record(entry: StageEntry): StageEntry {
        this.entries.push(entry);
        return entry;
    }

    getEntries(): StageEntry[] {
        return [...this.entries];
    }

    getEntry(stage: StageId): StageEntry | undefined {
        return this.entries.find(e => e.stage === stage);
    }

    get failed(): boolean {
        return this.entries.some(e => e.status === 'error');
    }

    get totalDurationMs(): number {
        return this.entries.reduce((sum, e) => sum + e.durationMs, 0);
    }

    toJSON(): object {
        return {
            runId: this.runId,
            startedAt: this.startedAt.toISOString(),
            totalDurationMs: this.totalDurationMs,
            stages: this.entries.map(e => ({
                ...e,
                startedAt: e.startedAt.toISOString(),
            })),
        };
    }
}
