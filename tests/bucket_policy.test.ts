import { describe, it, expect } from 'vitest';
import { bestRate, bucketRules, selectByBuckets, selectByBucketsDetailed } from '../src/strategy/bucket_policy.js';
import type { MarketSnapshot } from '../src/strategy/types.js';

const config = {
    minRate30d: 0.0005,
    minRate7d: 0.0003,
    minRate4to6d: 0.0002,
    minRate2to3d: 0.00015,
    floorRate: 0.0001,
};

function snapshot(rates: Record<number, number | null>): MarketSnapshot {
    return new Map(Object.entries(rates).map(([period, rate]) => [Number(period), rate]));
}

describe('bucketRules', () => {
    it('evaluates buckets from the longest period down', () => {
        expect(bucketRules(config).map(rule => rule.name)).toEqual(['30d', '7d', '4-6d', '2-3d']);
    });
});

describe('selectByBuckets', () => {
    it('takes the 30-day bucket regardless of lower buckets', () => {
        const rates = snapshot({ 30: 0.0005, 7: 0.001, 5: 0.002, 2: 0.003 });
        expect(selectByBucketsDetailed(rates, config)).toEqual({
            bucket: '30d',
            strategy: { type: 'LIMIT', rate: 0.0005, period: 30 },
        });
    });

    it('falls through to the 7-day bucket', () => {
        const rates = snapshot({ 30: 0.0004, 7: 0.0003, 5: 0.002 });
        expect(selectByBuckets(rates, config)).toEqual({ type: 'LIMIT', rate: 0.0003, period: 7 });
    });

    it('picks the best of 4, 5 and 6 days', () => {
        const rates = snapshot({ 30: null, 7: 0.00029, 4: 0.00021, 5: 0.00025, 6: 0.0002 });
        expect(selectByBucketsDetailed(rates, config)).toEqual({
            bucket: '4-6d',
            strategy: { type: 'LIMIT', rate: 0.00025, period: 5 },
        });
    });

    it('picks the best of 2 and 3 days when the mid buckets miss', () => {
        const rates = snapshot({ 5: 0.00019, 2: 0.00016, 3: 0.00018 });
        expect(selectByBuckets(rates, config)).toEqual({ type: 'LIMIT', rate: 0.00018, period: 3 });
    });

    it('falls back to the floor rate at 2 days', () => {
        expect(selectByBucketsDetailed(snapshot({}), config)).toEqual({
            bucket: '2-3d',
            strategy: { type: 'LIMIT', rate: 0.0001, period: 2 },
        });
        expect(selectByBuckets(snapshot({ 2: 0.00012, 3: null }), config))
            .toEqual({ type: 'LIMIT', rate: 0.0001, period: 2 });
    });
});

describe('bestRate', () => {
    it('prefers the first period on a tie', () => {
        expect(bestRate(snapshot({ 4: 0.0003, 5: 0.0003, 6: null }), [4, 5, 6])).toEqual({ rate: 0.0003, period: 4 });
    });

    it('returns null when none of the periods traded', () => {
        expect(bestRate(snapshot({ 4: null }), [4, 5, 6])).toBeNull();
    });
});
