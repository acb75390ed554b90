import { FRR_DELTA, type FundingOffer } from '../data/bitfinex/types.js';
import type { FloatingOfferConfig, SizingConfig } from '../config/funding.js';
import { isUsedBy, type FundingStrategy } from '../strategy/types.js';
import { pickDustOffer } from './balance_guard.js';

/**
 * Live offers that no longer match the strategy
 */
export function planCancellations(
    offers: readonly FundingOffer[],
    strategy: FundingStrategy,
    keepFloating: boolean,
): FundingOffer[] {
    return offers.filter(offer => {
        if (keepFloating && offer.type === FRR_DELTA) {
            return false;
        }
        return !isUsedBy(strategy, offer);
    });
}

/**
 * Split the available balance into offers of at most `maxOfferAmount` and at least `minOfferAmount`.
 *
 * Full-size offers are taken while more than one offer's worth remains. Once the remainder fits
 * in a single offer it is taken whole. When a full-size offer would leave less than the minimum
 * behind, the offer shrinks so exactly `minOfferAmount` is left for the last one.
 */
export function splitOfferAmounts(available: number, sizing: SizingConfig): number[] {
    const { maxOfferAmount, minOfferAmount } = sizing;
    const amounts: number[] = [];
    let remaining = available;

    while (remaining >= minOfferAmount) {
        let amount = maxOfferAmount;
        if (remaining <= maxOfferAmount) {
            amount = remaining;
        } else if (remaining - maxOfferAmount < minOfferAmount) {
            amount = remaining - minOfferAmount;
        }

        amounts.push(amount);
        remaining -= amount;
    }

    return amounts;
}

/**
 * Size of the floating offer to add, or null when none is needed
 */
export function planFloatingOffer(
    available: number,
    hasFloatingOffer: boolean,
    sizing: SizingConfig,
    floating: FloatingOfferConfig,
): number | null {
    if (!floating.enabled || hasFloatingOffer || available < sizing.minOfferAmount) {
        return null;
    }
    return Math.min(available, sizing.maxOfferAmount);
}

export interface ReconciliationPlan {
    cancel: FundingOffer[];
    dustCancel: FundingOffer | null;
    floatingAmount: number | null;
    offerAmounts: number[];
}

/**
 * What one cycle would do against a single snapshot.
 * The live cycle re-reads the wallet between steps; this treats `available` as fixed.
 */
export function planReconciliation(
    offers: readonly FundingOffer[],
    strategy: FundingStrategy,
    available: number,
    sizing: SizingConfig,
    floating: FloatingOfferConfig,
): ReconciliationPlan {
    const cancel = planCancellations(offers, strategy, floating.keepExisting);
    const remainingOffers = offers.filter(offer => !cancel.includes(offer));
    const dustCancel = pickDustOffer(remainingOffers, available, sizing);

    const hasFloating = remainingOffers.some(offer => offer.type === FRR_DELTA);
    const floatingAmount = planFloatingOffer(available, hasFloating, sizing, floating);
    const offerAmounts = splitOfferAmounts(available - (floatingAmount ?? 0), sizing);

    return { cancel, dustCancel, floatingAmount, offerAmounts };
}
