/**
 * Day-pair fixtures shared by the unit and integration tests
 */

import type { DailyData } from '../../src/types/index.js';

/** Profitable day with 11.11% sales growth */
export const growthDay: DailyData = {
    today: { sales: 1000, costs: 800, customers: 50 },
    yesterday: { sales: 900, costs: 750, customers: 45 },
};

/** Loss-making day, flat sales */
export const lossDay: DailyData = {
    today: { sales: 500, costs: 700, customers: 20 },
    yesterday: { sales: 500, costs: 650, customers: 20 },
};

/** CAC jumps from 15.00 to 20.00 (+33.33%) */
export const cacSpikeDay: DailyData = {
    today: { sales: 1000, costs: 800, customers: 40 },
    yesterday: { sales: 900, costs: 750, customers: 50 },
};

/** Nothing sold and nobody acquired yesterday */
export const zeroBaseDay: DailyData = {
    today: { sales: 300, costs: 120, customers: 0 },
    yesterday: { sales: 0, costs: 0, customers: 0 },
};

/** Every rule fires */
export const troubledDay: DailyData = {
    today: { sales: 600, costs: 1200, customers: 10 },
    yesterday: { sales: 500, costs: 600, customers: 20 },
};
