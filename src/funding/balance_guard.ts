import { FRR_DELTA, type FundingOffer } from '../data/bitfinex/types.js';
import type { SizingConfig } from '../config/funding.js';

/**
 * Idle balance that is non-zero but too small to place an offer with
 */
export function isDustBalance(available: number, sizing: SizingConfig): boolean {
    return available > sizing.minTradableAmount && available < sizing.minOfferAmount;
}

/**
 * Smallest fixed-rate offer to cancel so its capital merges with the dust balance.
 * Floating offers are left alone.
 */
export function pickDustOffer(
    offers: readonly FundingOffer[],
    available: number,
    sizing: SizingConfig,
): FundingOffer | null {
    if (!isDustBalance(available, sizing)) {
        return null;
    }

    let smallest: FundingOffer | null = null;
    for (const offer of offers) {
        if (offer.type === FRR_DELTA) {
            continue;
        }
        if (smallest === null || offer.amount < smallest.amount) {
            smallest = offer;
        }
    }

    return smallest;
}
