import { describe, it, expect } from 'vitest';
import { qualifyingCandidates, selectByYield, yieldFloorRate } from '../src/strategy/yield_policy.js';
import { annualYield, type MarketSnapshot } from '../src/strategy/types.js';

const config = { minRate: 0.0001, rateIncrementPerDay: 0.00003 };

function snapshot(rates: Record<number, number | null>): MarketSnapshot {
    return new Map(Object.entries(rates).map(([period, rate]) => [Number(period), rate]));
}

describe('yieldFloorRate', () => {
    it('uses the configured minimum when the 2-day market is quiet', () => {
        expect(yieldFloorRate(snapshot({ 2: null }), config)).toBe(0.0001);
    });

    it('raises the floor to a higher 2-day rate', () => {
        expect(yieldFloorRate(snapshot({ 2: 0.00025 }), config)).toBe(0.00025);
    });

    it('keeps the minimum when the 2-day rate is below it', () => {
        expect(yieldFloorRate(snapshot({ 2: 0.00005 }), config)).toBe(0.0001);
    });
});

describe('selectByYield', () => {
    it('picks the qualifying period with the best annual yield', () => {
        const rates = snapshot({ 2: 0.0002, 7: 0.0004, 30: 0.0009 });

        // 30d needs 0.0002 + 28 * 0.00003 = 0.00104
        expect(qualifyingCandidates(rates, config).map(c => c.period)).toEqual([2, 7]);
        expect(selectByYield(rates, config)).toEqual({ type: 'LIMIT', rate: 0.0004, period: 7 });
    });

    it('skips periods without traded volume', () => {
        const rates = snapshot({ 2: 0.0002, 3: null, 4: null, 30: 0.0011 });

        expect(qualifyingCandidates(rates, config).map(c => c.period)).toEqual([2, 30]);
        expect(selectByYield(rates, config)).toEqual({ type: 'LIMIT', rate: 0.0011, period: 30 });
    });

    it('falls back to the floor at 2 days when nothing qualifies', () => {
        expect(selectByYield(snapshot({}), config)).toEqual({ type: 'LIMIT', rate: 0.0001, period: 2 });
        expect(selectByYield(snapshot({ 2: 0.00005, 30: 0.0001 }), config))
            .toEqual({ type: 'LIMIT', rate: 0.0001, period: 2 });
    });

    it('never selects a period beaten by another qualifying one', () => {
        const cases = [
            snapshot({ 2: 0.0002, 3: 0.00024, 5: 0.0003, 10: 0.0005, 20: 0.0008 }),
            snapshot({ 2: 0.0003, 4: 0.00036, 8: 0.0006, 14: 0.0007, 30: 0.0013 }),
            snapshot({ 2: 0.0001, 6: 0.0003, 15: 0.0006, 21: 0.00072, 24: 0.0009 }),
        ];

        for (const rates of cases) {
            const selected = selectByYield(rates, config);
            const selectedYield = annualYield(selected.rate, selected.period);
            for (const candidate of qualifyingCandidates(rates, config)) {
                expect(selectedYield).toBeGreaterThanOrEqual(candidate.annualYield);
            }
        }
    });
});
