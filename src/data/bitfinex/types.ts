/**
 * Funding offer types accepted by Bitfinex
 * LIMIT is a fixed-rate offer, FRRDELTAVAR follows the flash return rate
 */
export type FundingOfferType = 'LIMIT' | 'FRRDELTAVAR';

export const LIMIT: FundingOfferType = 'LIMIT';
export const FRR_DELTA: FundingOfferType = 'FRRDELTAVAR';

/**
 * One candle of a funding-period market (fUSD:p{period})
 */
export interface Candle {
    mts: number;        // Candle open time (ms)
    open: number;
    close: number;
    high: number;
    low: number;
    volume: number;
}

/**
 * Live funding offer resting in the book
 */
export interface FundingOffer {
    id: number;
    symbol: string;
    type: string;
    rate: number;
    period: number;
    amount: number;
    status: string;
    mtsCreated: number;
}

export interface FundingOfferRequest {
    symbol: string;
    type: FundingOfferType;
    amount: number;
    rate: number;
    period: number;
}

/**
 * Notification returned for offer submit/cancel
 */
export interface OfferNotification {
    status: string;
    text: string;
    offer: FundingOffer | null;
}

export interface FundingWallet {
    type: string;               // exchange | margin | funding
    currency: string;
    balance: number;
    balanceAvailable: number | null;
}

/**
 * Filled funding currently earning interest
 */
export interface FundingCredit {
    id: number;
    symbol: string;
    amount: number;
    rate: number;               // 0 when the credit was taken at FRR
    period: number;
}

export interface FundingTicker {
    frr: number;
    bid: number;
    bidPeriod: number;
    ask: number;
    askPeriod: number;
    lastPrice: number;
    volume: number;
}

export interface CandleQuery {
    timeframe: string;          // 1m, 5m, 15m, 1h ...
    start?: number;             // ms
    end?: number;               // ms
    limit?: number;
}
