import { errorMessage, logger } from '../infra/logger.js';
import { getAvailableBalance, type FundingExchange } from '../data/bitfinex/exchange.js';
import { FRR_DELTA, type FundingOffer, type FundingOfferRequest } from '../data/bitfinex/types.js';
import type { FundingConfig } from '../config/funding.js';
import type { StrategySelector } from '../strategy/selector.js';
import type { FundingStrategy } from '../strategy/types.js';
import { isDustBalance, pickDustOffer } from './balance_guard.js';
import { planCancellations, planFloatingOffer, splitOfferAmounts } from './offer_plan.js';

export type ActionOutcome =
    | { status: 'ok' }
    | { status: 'failed'; error: string }
    | { status: 'skipped' };

export type CancelReason = 'strategy_mismatch' | 'dust_consolidation';

export type ReconcileAction =
    | { kind: 'cancel'; reason: CancelReason; offer: FundingOffer; outcome: ActionOutcome }
    | { kind: 'submit'; request: FundingOfferRequest; outcome: ActionOutcome };

/**
 * One reconciliation pass against the live account.
 *
 * Nothing is carried between cycles: each run derives its decisions from the offers and
 * wallet it reads, so an action that failed last time is simply re-planned.
 */
export class OfferReconciler {
    constructor(
        private readonly exchange: FundingExchange,
        private readonly selector: StrategySelector,
        private readonly config: FundingConfig,
    ) {}

    async runCycle(): Promise<ReconcileAction[]> {
        const { symbol, sizing, floating } = this.config;
        const actions: ReconcileAction[] = [];

        const strategy = await this.selector.select();

        // Cancel everything that no longer matches the strategy
        const offers = await this.exchange.getFundingOffers(symbol);
        for (const offer of planCancellations(offers, strategy, floating.keepExisting)) {
            actions.push(await this.cancel(offer, 'strategy_mismatch'));
        }

        // Consolidate a dust balance by freeing the smallest offer
        let available = await this.readAvailable();
        if (isDustBalance(available, sizing)) {
            const dustOffer = pickDustOffer(await this.exchange.getFundingOffers(symbol), available, sizing);
            if (dustOffer) {
                actions.push(await this.cancel(dustOffer, 'dust_consolidation'));
            }
        }

        if (floating.enabled) {
            available = await this.readAvailable();
            const current = await this.exchange.getFundingOffers(symbol);
            const amount = planFloatingOffer(
                available,
                current.some(offer => offer.type === FRR_DELTA),
                sizing,
                floating,
            );
            if (amount !== null) {
                actions.push(await this.submit({ symbol, type: FRR_DELTA, amount, rate: 0, period: floating.period }));
            }
        }

        // Lend out what is left at the strategy's rate
        available = await this.readAvailable();
        for (const amount of splitOfferAmounts(available, sizing)) {
            actions.push(await this.submit(this.offerFor(strategy, amount)));
        }

        logger.info('reconcile.cycle', {
            strategy,
            cancelled: actions.filter(a => a.kind === 'cancel' && a.outcome.status === 'ok').length,
            submitted: actions.filter(a => a.kind === 'submit' && a.outcome.status === 'ok').length,
            failed: actions.filter(a => a.outcome.status === 'failed').length,
            dryRun: this.config.dryRun,
        });

        return actions;
    }

    private offerFor(strategy: FundingStrategy, amount: number): FundingOfferRequest {
        return {
            symbol: this.config.symbol,
            type: strategy.type,
            amount,
            rate: strategy.rate,
            period: strategy.period,
        };
    }

    private async readAvailable(): Promise<number> {
        const available = await getAvailableBalance(this.exchange, this.config.currency);
        if (available === null) {
            logger.warn('wallet.balance_unavailable', {
                currency: this.config.currency,
            });
            return 0;
        }
        return available;
    }

    private async cancel(offer: FundingOffer, reason: CancelReason): Promise<ReconcileAction> {
        const payload = {
            reason,
            id: offer.id,
            type: offer.type,
            rate: offer.rate,
            period: offer.period,
            amount: offer.amount,
        };

        if (this.config.dryRun) {
            logger.info('reconcile.cancel.dry_run', payload);
            return { kind: 'cancel', reason, offer, outcome: { status: 'skipped' } };
        }

        try {
            await this.exchange.cancelFundingOffer(offer.id);
            logger.info('reconcile.cancel', payload);
            return { kind: 'cancel', reason, offer, outcome: { status: 'ok' } };
        } catch (error) {
            const message = errorMessage(error);
            logger.error('reconcile.cancel.error', { ...payload, error: message });
            return { kind: 'cancel', reason, offer, outcome: { status: 'failed', error: message } };
        }
    }

    private async submit(request: FundingOfferRequest): Promise<ReconcileAction> {
        if (this.config.dryRun) {
            logger.info('reconcile.submit.dry_run', request);
            return { kind: 'submit', request, outcome: { status: 'skipped' } };
        }

        try {
            const notification = await this.exchange.submitFundingOffer(request);
            logger.info('reconcile.submit', {
                ...request,
                offerId: notification.offer?.id ?? null,
                status: notification.status,
                text: notification.text,
            });
            return { kind: 'submit', request, outcome: { status: 'ok' } };
        } catch (error) {
            const message = errorMessage(error);
            logger.error('reconcile.submit.error', { ...request, error: message });
            return { kind: 'submit', request, outcome: { status: 'failed', error: message } };
        }
    }
}
