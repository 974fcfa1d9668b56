/**
 * REST API Routes
 *
 * Marshals the report input/output shape over HTTP.
 */

import express, { Request, Response, NextFunction } from 'express';
import type { ReportThresholds } from '../types/index.js';
import { ReportPipeline } from '../core/pipeline.js';
import { resolveThresholds } from '../core/config.js';
import { ConfigError, ValidationError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { collectInputIssues } from '../pipeline/input-validator.js';

const logger = createLogger('API');

export function createApiRouter(thresholds: ReportThresholds): express.Router {
    const router = express.Router();
    const pipeline = new ReportPipeline(thresholds);

    // ============================================
    // REPORT ENDPOINTS
    // ============================================

    /**
     * POST /api/report
     * Compute metrics and recommendations for a today/yesterday pair
     */
    router.post('/report', (req: Request, res: Response, next: NextFunction) => {
        try {
            const body: unknown = req.body;
            const override = isRecord(body) ? body.thresholds : undefined;
            const activeThresholds = resolveRequestThresholds(body, override, pipeline.getThresholds());

            const result = pipeline.run(body, activeThresholds);

            res.json({
                success: true,
                runId: result.runId,
                profit_status: result.report.profitStatus,
                alerts: result.report.alerts,
                recommendations: result.report.recommendations,
                metrics: result.metrics,
            });
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /api/thresholds
     * Default thresholds applied when a request carries no override
     */
    router.get('/thresholds', (_req: Request, res: Response) => {
        res.json({ thresholds: pipeline.getThresholds() });
    });

    // ============================================
    // ERROR HANDLER
    // ============================================

    router.use((error: Error, _req: Request, res: Response, _next: NextFunction) => {
        if (error instanceof ValidationError) {
            res.status(400).json({ error: 'Invalid input data', issues: error.issues });
            return;
        }
        if (error instanceof ConfigError) {
            res.status(400).json({ error: 'Invalid thresholds', issues: error.issues });
            return;
        }

        logger.error('API Error:', error);
        res.status(500).json({
            error: 'Internal server error',
            message: process.env.NODE_ENV === 'development' ? error.message : undefined,
        });
    });

    return router;
}

/**
 * Resolve the request's threshold override. When the override is invalid and
 * the day records are too, both issue lists go back together.
 */
function resolveRequestThresholds(body: unknown, override: unknown, base: ReportThresholds): ReportThresholds {
    try {
        return resolveThresholds(override, base);
    } catch (error) {
        if (error instanceof ConfigError) {
            const inputIssues = collectInputIssues(body);
            if (inputIssues.length > 0) {
                throw new ValidationError([...inputIssues, ...error.issues]);
            }
        }
        throw error;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
