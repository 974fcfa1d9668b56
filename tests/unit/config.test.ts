import { describe, it, expect } from 'vitest';
import {
    DEFAULT_THRESHOLDS,
    loadThresholds,
    resolvePort,
    resolveThresholds,
} from '../../src/core/config.js';
import { ConfigError } from '../../src/core/errors.js';

describe('loadThresholds', () => {
    it('falls back to the defaults', () => {
        expect(loadThresholds({})).toEqual(DEFAULT_THRESHOLDS);
    });

    it('reads thresholds from the environment', () => {
        expect(loadThresholds({
            CAC_CEILING: '35.5',
            CAC_INCREASE_ALERT_PCT: '25',
            SALES_GROWTH_ALERT_PCT: '5',
            COST_INCREASE_ALERT_PCT: '',
        })).toEqual({
            cacCeiling: 35.5,
            cacIncreasePct: 25,
            salesGrowthPct: 5,
            costIncreasePct: 15,
        });
    });

    it('rejects values that are not numbers', () => {
        expect(() => loadThresholds({ CAC_CEILING: 'lots' })).toThrow(ConfigError);
    });

    it('rejects negative values', () => {
        try {
            loadThresholds({ SALES_GROWTH_ALERT_PCT: '-1' });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigError);
            if (error instanceof ConfigError) {
                expect(error.issues).toEqual([{ path: 'SALES_GROWTH_ALERT_PCT', message: 'must not be negative' }]);
            }
        }
    });
});

describe('resolveThresholds', () => {
    it('returns the base thresholds without an override', () => {
        expect(resolveThresholds(undefined)).toEqual(DEFAULT_THRESHOLDS);
    });

    it('merges a partial override', () => {
        expect(resolveThresholds({ cacCeiling: 20 })).toEqual({ ...DEFAULT_THRESHOLDS, cacCeiling: 20 });
    });

    it('rejects a malformed override', () => {
        expect(() => resolveThresholds({ salesGrowthPct: '10' })).toThrow(
            'Invalid threshold override: thresholds.salesGrowthPct must be a number'
        );
        expect(() => resolveThresholds('strict')).toThrow(
            'Invalid threshold override: thresholds must be an object'
        );
    });
});

describe('resolvePort', () => {
    it('defaults to 3000', () => {
        expect(resolvePort({})).toBe(3000);
        expect(resolvePort({ PORT: 'abc' })).toBe(3000);
        expect(resolvePort({ PORT: '8080' })).toBe(8080);
    });
});
