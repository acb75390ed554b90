import { LIMIT } from '../data/bitfinex/types.js';
import type { YieldPolicyConfig } from '../config/funding.js';
import {
    POSSIBLE_PERIODS,
    annualYield,
    observedRate,
    type FundingStrategy,
    type MarketSnapshot,
} from './types.js';

export const YIELD_TIMEFRAME = '5m';
export const YIELD_LOOKBACK_MS = 60 * 60 * 1000;
export const YIELD_PERIODS: readonly number[] = POSSIBLE_PERIODS;

const BASE_PERIOD = 2;

export interface YieldCandidate {
    period: number;
    rate: number;
    annualYield: number;
}

/**
 * Floor rate: configured minimum, raised to the observed 2-day rate when that is higher
 */
export function yieldFloorRate(snapshot: MarketSnapshot, config: YieldPolicyConfig): number {
    const baseRate = observedRate(snapshot, BASE_PERIOD);
    return baseRate !== null && baseRate > config.minRate ? baseRate : config.minRate;
}

/**
 * Periods whose observed rate clears floor + (period - 2) * increment, in iteration order
 */
export function qualifyingCandidates(snapshot: MarketSnapshot, config: YieldPolicyConfig): YieldCandidate[] {
    const floor = yieldFloorRate(snapshot, config);
    const candidates: YieldCandidate[] = [];

    for (const period of YIELD_PERIODS) {
        const rate = observedRate(snapshot, period);
        if (rate === null) {
            continue;
        }

        const threshold = floor + (period - BASE_PERIOD) * config.rateIncrementPerDay;
        if (rate >= threshold) {
            candidates.push({ period, rate, annualYield: annualYield(rate, period) });
        }
    }

    return candidates;
}

/**
 * Annualized-yield maximization across all lending periods
 */
export function selectByYield(snapshot: MarketSnapshot, config: YieldPolicyConfig): FundingStrategy {
    let best: YieldCandidate | null = null;

    for (const candidate of qualifyingCandidates(snapshot, config)) {
        if (best === null || candidate.annualYield > best.annualYield) {
            best = candidate;
        }
    }

    if (best === null) {
        return { type: LIMIT, rate: yieldFloorRate(snapshot, config), period: BASE_PERIOD };
    }

    return { type: LIMIT, rate: best.rate, period: best.period };
}
