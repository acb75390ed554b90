import { logger } from '../infra/logger.js';
import type { FundingExchange } from '../data/bitfinex/exchange.js';
import type { Candle } from '../data/bitfinex/types.js';
import { isLendingPeriod, type MarketSnapshot } from './types.js';

/**
 * Highest `high` among candles that actually traded, or null when none did
 */
export function highestTradedRate(candles: readonly Candle[]): number | null {
    let highest: number | null = null;

    for (const candle of candles) {
        if (candle.volume > 0 && (highest === null || candle.high > highest)) {
            highest = candle.high;
        }
    }

    return highest;
}

/**
 * Reads per-period funding candles and reduces them to rate signals
 */
export class RateObserver {
    constructor(
        private readonly exchange: FundingExchange,
        private readonly symbol: string,
    ) {}

    async highestRate(period: number, timeframe: string, start: number, end: number = Date.now()): Promise<number | null> {
        if (!isLendingPeriod(period)) {
            throw new Error(`Unsupported lending period: ${period}`);
        }

        const candles = await this.exchange.getPublicCandles(`${this.symbol}:p${period}`, {
            timeframe,
            start,
            end,
        });

        return highestTradedRate(candles);
    }

    /**
     * Query each period in turn over the trailing window.
     * Public candle endpoints are rate limited per IP, so requests stay sequential.
     */
    async observe(periods: readonly number[], timeframe: string, lookbackMs: number): Promise<MarketSnapshot> {
        const end = Date.now();
        const start = end - lookbackMs;
        const snapshot = new Map<number, number | null>();

        for (const period of periods) {
            snapshot.set(period, await this.highestRate(period, timeframe, start, end));
        }

        logger.debug('rates.observed', {
            timeframe,
            lookbackMs,
            rates: Object.fromEntries(snapshot),
        });

        return snapshot;
    }
}
