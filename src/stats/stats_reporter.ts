import { logger } from '../infra/logger.js';
import { getTotalBalance, type FundingExchange } from '../data/bitfinex/exchange.js';
import type { FundingCredit } from '../data/bitfinex/types.js';
import type { FundingConfig } from '../config/funding.js';

export interface FundingStats {
    totalAmount: number;
    totalEarn: number;          // Gross daily interest
    dailyEarnings: number;      // After fee deduction, when enabled
    averageRate: number;
}

/**
 * Aggregate active credits. Credits taken at the floating rate carry a rate of 0
 * and are counted at the current FRR.
 * Returns null when nothing is lent.
 */
export function summarizeCredits(
    credits: readonly FundingCredit[],
    frrRate: number,
    feeRate: number | null,
): FundingStats | null {
    let totalAmount = 0;
    let totalEarn = 0;

    for (const credit of credits) {
        const rate = credit.rate === 0 ? frrRate : credit.rate;
        totalAmount += credit.amount;
        totalEarn += rate * credit.amount;
    }

    if (totalAmount === 0) {
        return null;
    }

    return {
        totalAmount,
        totalEarn,
        dailyEarnings: feeRate === null ? totalEarn : totalEarn * (1 - feeRate),
        averageRate: totalEarn / totalAmount,
    };
}

export interface StatsReport extends FundingStats {
    frrRate: number;
    totalAsset: number;
    utilization: number | null;
}

export class StatsReporter {
    constructor(
        private readonly exchange: FundingExchange,
        private readonly config: FundingConfig,
    ) {}

    async runCycle(): Promise<StatsReport | null> {
        const { frr } = await this.exchange.getPublicTicker(this.config.symbol);
        const credits = await this.exchange.getFundingCredits(this.config.symbol);
        const stats = summarizeCredits(credits, frr, this.config.feeRate);

        if (stats === null) {
            logger.info('stats.no_active_credits', {
                symbol: this.config.symbol,
                frrRate: frr,
            });
            return null;
        }

        const totalAsset = await getTotalBalance(this.exchange, this.config.currency);
        const report: StatsReport = {
            ...stats,
            frrRate: frr,
            totalAsset,
            utilization: totalAsset > 0 ? stats.totalAmount / totalAsset : null,
        };

        logger.info('stats.report', report);

        return report;
    }
}
