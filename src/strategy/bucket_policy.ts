import { LIMIT } from '../data/bitfinex/types.js';
import type { BucketPolicyConfig } from '../config/funding.js';
import { observedRate, type FundingStrategy, type MarketSnapshot } from './types.js';

export const BUCKET_TIMEFRAME = '1m';
export const BUCKET_LOOKBACK_MS = 15 * 60 * 1000;

/**
 * One period bucket: the periods it looks at and how it turns their rates into a strategy.
 * `build` returns null when the bucket does not apply, passing control to the next one.
 */
export interface BucketRule {
    name: string;
    periods: readonly number[];
    build(snapshot: MarketSnapshot): FundingStrategy | null;
}

/**
 * Best observed (rate, period) among the given periods; first period wins ties
 */
export function bestRate(snapshot: MarketSnapshot, periods: readonly number[]): { rate: number; period: number } | null {
    let best: { rate: number; period: number } | null = null;

    for (const period of periods) {
        const rate = observedRate(snapshot, period);
        if (rate !== null && (best === null || rate > best.rate)) {
            best = { rate, period };
        }
    }

    return best;
}

function thresholdRule(name: string, periods: readonly number[], minRate: number): BucketRule {
    return {
        name,
        periods,
        build(snapshot) {
            const best = bestRate(snapshot, periods);
            if (best === null || best.rate < minRate) {
                return null;
            }
            return { type: LIMIT, rate: best.rate, period: best.period };
        },
    };
}

/**
 * Buckets in priority order. The last one always produces a strategy.
 */
export function bucketRules(config: BucketPolicyConfig): BucketRule[] {
    const shortTerm = thresholdRule('2-3d', [2, 3], config.minRate2to3d);

    return [
        thresholdRule('30d', [30], config.minRate30d),
        thresholdRule('7d', [7], config.minRate7d),
        thresholdRule('4-6d', [4, 5, 6], config.minRate4to6d),
        {
            ...shortTerm,
            build: snapshot => shortTerm.build(snapshot)
                ?? { type: LIMIT, rate: config.floorRate, period: 2 },
        },
    ];
}

export const BUCKET_PERIODS: readonly number[] = [30, 7, 4, 5, 6, 2, 3];

export interface BucketSelection {
    bucket: string;
    strategy: FundingStrategy;
}

/**
 * Tiered period-bucket selection, first matching bucket wins
 */
export function selectByBucketsDetailed(snapshot: MarketSnapshot, config: BucketPolicyConfig): BucketSelection {
    for (const rule of bucketRules(config)) {
        const strategy = rule.build(snapshot);
        if (strategy !== null) {
            return { bucket: rule.name, strategy };
        }
    }

    // Unreachable while the terminal bucket carries its floor fallback
    return { bucket: 'floor', strategy: { type: LIMIT, rate: config.floorRate, period: 2 } };
}

export function selectByBuckets(snapshot: MarketSnapshot, config: BucketPolicyConfig): FundingStrategy {
    return selectByBucketsDetailed(snapshot, config).strategy;
}
