/**
 * Express application
 */

import express, { Request, Response, NextFunction } from 'express';
import type { ReportThresholds } from './types/index.js';
import { createApiRouter } from './api/routes.js';
import { DEFAULT_THRESHOLDS } from './core/config.js';

export const SERVICE_NAME = 'daily-business-report';
export const SERVICE_VERSION = '0.1.0';

export function createApp(thresholds: ReportThresholds = DEFAULT_THRESHOLDS): express.Express {
    const app = express();

    // Middleware
    app.use(express.json());

    // API routes
    app.use('/api', createApiRouter(thresholds));

    // Health check
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'ok',
            service: SERVICE_NAME,
            version: SERVICE_VERSION,
        });
    });

    app.use((_req: Request, res: Response) => {
        res.status(404).json({ error: 'Not found' });
    });

    // Malformed JSON bodies never reach the API router
    app.use((error: Error, _req: Request, res: Response, next: NextFunction) => {
        if (error instanceof SyntaxError) {
            res.status(400).json({ error: 'Malformed JSON body' });
            return;
        }
        next(error);
    });

    return app;
}
