/**
 * Print the report for a sample day pair
 *
 * Usage: npm run sample
 */

import 'dotenv/config';

import { loadThresholds } from '../../src/core/config.js';
import { runReport } from '../../src/core/pipeline.js';

const sampleInput = {
    today: { sales: 1000, costs: 800, customers: 50 },
    yesterday: { sales: 900, costs: 750, customers: 45 },
};

const report = runReport(sampleInput, loadThresholds());

console.log(JSON.stringify({
    profit_status: report.profitStatus,
    alerts: report.alerts,
    recommendations: report.recommendations,
}, null, 2));
