import { describe, it, expect } from 'vitest';
import { isDustBalance, pickDustOffer } from '../src/funding/balance_guard.js';
import { makeOffer } from './support/fake_exchange.js';

const sizing = { maxOfferAmount: 1000, minOfferAmount: 150, minTradableAmount: 1 };

describe('isDustBalance', () => {
    it('is strictly between the tradable and offer minimums', () => {
        expect(isDustBalance(100, sizing)).toBe(true);
        expect(isDustBalance(1, sizing)).toBe(false);
        expect(isDustBalance(150, sizing)).toBe(false);
        expect(isDustBalance(0, sizing)).toBe(false);
    });
});

describe('pickDustOffer', () => {
    it('cancels only the smallest offer', () => {
        const offers = [makeOffer({ id: 1, amount: 50 }), makeOffer({ id: 2, amount: 30 })];
        expect(pickDustOffer(offers, 100, sizing)?.id).toBe(2);
    });

    it('ignores floating offers', () => {
        const offers = [
            makeOffer({ id: 1, amount: 10, type: 'FRRDELTAVAR', rate: 0, period: 30 }),
            makeOffer({ id: 2, amount: 40 }),
        ];
        expect(pickDustOffer(offers, 100, sizing)?.id).toBe(2);
    });

    it('keeps the first offer on an amount tie', () => {
        const offers = [makeOffer({ id: 7, amount: 30 }), makeOffer({ id: 8, amount: 30 })];
        expect(pickDustOffer(offers, 100, sizing)?.id).toBe(7);
    });

    it('does nothing outside the dust range or without offers', () => {
        const offers = [makeOffer({ id: 1, amount: 50 })];
        expect(pickDustOffer(offers, 0.5, sizing)).toBeNull();
        expect(pickDustOffer(offers, 200, sizing)).toBeNull();
        expect(pickDustOffer([], 100, sizing)).toBeNull();
    });
});
