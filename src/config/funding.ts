import type { Env } from './env.js';

export type StrategyPolicy = 'yield' | 'bucket';

/**
 * Offer sizing thresholds, in funding currency units
 */
export interface SizingConfig {
    maxOfferAmount: number;
    minOfferAmount: number;
    minTradableAmount: number;
}

export interface YieldPolicyConfig {
    minRate: number;
    rateIncrementPerDay: number;
}

export interface BucketPolicyConfig {
    minRate30d: number;
    minRate7d: number;
    minRate4to6d: number;
    minRate2to3d: number;
    floorRate: number;
}

export interface FloatingOfferConfig {
    keepExisting: boolean;
    enabled: boolean;
    period: number;
}

/**
 * Everything the reconciliation and stats cycles need, detached from process.env
 */
export interface FundingConfig {
    symbol: string;
    currency: string;
    sizing: SizingConfig;
    policy: StrategyPolicy;
    yieldPolicy: YieldPolicyConfig;
    bucketPolicy: BucketPolicyConfig;
    floating: FloatingOfferConfig;
    feeRate: number | null;
    dryRun: boolean;
}

export function fundingConfigFromEnv(env: Env): FundingConfig {
    return {
        symbol: env.FUNDING_SYMBOL,
        currency: env.FUNDING_CURRENCY,
        sizing: {
            maxOfferAmount: env.MAX_OFFER_AMOUNT,
            minOfferAmount: env.MIN_OFFER_AMOUNT,
            minTradableAmount: env.MIN_TRADABLE_AMOUNT,
        },
        policy: env.STRATEGY_POLICY,
        yieldPolicy: {
            minRate: env.YIELD_MIN_RATE,
            rateIncrementPerDay: env.YIELD_RATE_INCREMENT_PER_DAY,
        },
        bucketPolicy: {
            minRate30d: env.BUCKET_MIN_RATE_30D,
            minRate7d: env.BUCKET_MIN_RATE_7D,
            minRate4to6d: env.BUCKET_MIN_RATE_4_6D,
            minRate2to3d: env.BUCKET_MIN_RATE_2_3D,
            floorRate: env.BUCKET_FLOOR_RATE,
        },
        floating: {
            keepExisting: env.KEEP_FLOATING_OFFERS,
            enabled: env.FLOATING_OFFER_ENABLED,
            period: env.FLOATING_OFFER_PERIOD,
        },
        feeRate: env.STATS_FEE_DEDUCTION_ENABLED ? env.BITFINEX_FEE_RATE : null,
        dryRun: env.DRY_RUN,
    };
}
