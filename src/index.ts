/**
 * Daily Business Report Entry Point
 */

// Load environment variables FIRST (before other imports)
import 'dotenv/config';

import { createApp } from './app.js';
import { loadThresholds, resolvePort } from './core/config.js';
import { createLogger } from './core/logger.js';

const logger = createLogger('Server');

const thresholds = loadThresholds();
const PORT = resolvePort();

const app = createApp(thresholds);

// Start server
app.listen(PORT, () => {
    logger.info(`Daily business report running on http://localhost:${PORT}`);
    logger.info(`POST /api/report  - Compute today's report`);
    logger.info(`GET  /api/thresholds - Active thresholds`);
    logger.info(
        `Thresholds: CAC ceiling ${thresholds.cacCeiling}, CAC increase ${thresholds.cacIncreasePct}%, ` +
        `sales growth ${thresholds.salesGrowthPct}%, cost increase ${thresholds.costIncreasePct}%`
    );
});

export { app };
