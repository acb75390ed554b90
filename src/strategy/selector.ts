import { logger } from '../infra/logger.js';
import type { FundingConfig, StrategyPolicy } from '../config/funding.js';
import { RateObserver } from './rate_observer.js';
import { YIELD_LOOKBACK_MS, YIELD_PERIODS, YIELD_TIMEFRAME, selectByYield } from './yield_policy.js';
import { BUCKET_LOOKBACK_MS, BUCKET_PERIODS, BUCKET_TIMEFRAME, selectByBuckets } from './bucket_policy.js';
import type { FundingStrategy, MarketSnapshot } from './types.js';

/**
 * Market window each policy reads
 */
export interface ObservationWindow {
    periods: readonly number[];
    timeframe: string;
    lookbackMs: number;
}

export const OBSERVATION_WINDOWS: Record<StrategyPolicy, ObservationWindow> = {
    yield: { periods: YIELD_PERIODS, timeframe: YIELD_TIMEFRAME, lookbackMs: YIELD_LOOKBACK_MS },
    bucket: { periods: BUCKET_PERIODS, timeframe: BUCKET_TIMEFRAME, lookbackMs: BUCKET_LOOKBACK_MS },
};

export function selectStrategy(policy: StrategyPolicy, snapshot: MarketSnapshot, config: FundingConfig): FundingStrategy {
    switch (policy) {
        case 'yield':
            return selectByYield(snapshot, config.yieldPolicy);
        case 'bucket':
            return selectByBuckets(snapshot, config.bucketPolicy);
    }
}

/**
 * Observes the market for the configured policy and picks this cycle's strategy
 */
export class StrategySelector {
    constructor(
        private readonly observer: RateObserver,
        private readonly config: FundingConfig,
    ) {}

    async observe(policy: StrategyPolicy = this.config.policy): Promise<MarketSnapshot> {
        const window = OBSERVATION_WINDOWS[policy];
        return this.observer.observe(window.periods, window.timeframe, window.lookbackMs);
    }

    async select(): Promise<FundingStrategy> {
        const snapshot = await this.observe();
        const strategy = selectStrategy(this.config.policy, snapshot, this.config);

        logger.info('strategy.selected', {
            policy: this.config.policy,
            type: strategy.type,
            rate: strategy.rate,
            period: strategy.period,
        });

        return strategy;
    }
}
