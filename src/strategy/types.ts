import type { FundingOffer, FundingOfferType } from '../data/bitfinex/types.js';

/**
 * Target offer configuration computed fresh every reconciliation cycle
 */
export interface FundingStrategy {
    type: FundingOfferType;
    rate: number;
    period: number;
}

/**
 * Highest observed rate per period; null means no traded volume in the window
 */
export type MarketSnapshot = ReadonlyMap<number, number | null>;

/**
 * Lending periods (days) with a candle market on Bitfinex
 */
export const POSSIBLE_PERIODS = [2, 3, 4, 5, 6, 7, 8, 10, 14, 15, 16, 20, 21, 22, 24, 30] as const;

export type LendingPeriod = typeof POSSIBLE_PERIODS[number];

export function isLendingPeriod(period: number): period is LendingPeriod {
    return POSSIBLE_PERIODS.some(p => p === period);
}

/**
 * Whether a live offer already implements the strategy.
 * Rates compare with exact equality: offers are placed from the same computed values.
 */
export function isUsedBy(strategy: FundingStrategy, offer: FundingOffer): boolean {
    return (
        strategy.type === offer.type &&
        strategy.rate === offer.rate &&
        strategy.period === offer.period
    );
}

/**
 * Compounded yearly yield of re-lending at `rate` for `period` days
 */
export function annualYield(rate: number, period: number): number {
    return Math.pow(1 + rate * period, 365 / period) - 1;
}

export function observedRate(snapshot: MarketSnapshot, period: number): number | null {
    return snapshot.get(period) ?? null;
}
