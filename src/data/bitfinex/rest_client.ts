import { createHmac } from 'crypto';
import { z } from 'zod';
import { logger } from '../../infra/logger.js';
import type { FundingExchange } from './exchange.js';
import type {
    Candle,
    CandleQuery,
    FundingCredit,
    FundingOffer,
    FundingOfferRequest,
    FundingTicker,
    FundingWallet,
    OfferNotification,
} from './types.js';

const PUBLIC_BASE_URL = 'https://api-pub.bitfinex.com';
const AUTH_BASE_URL = 'https://api.bitfinex.com';

/**
 * Raised on a non-2xx response or an ["error", code, message] payload
 */
export class BitfinexApiError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly code: number | null = null,
    ) {
        super(message);
        this.name = 'BitfinexApiError';
    }
}

// Array layouts follow the v2 REST docs; unused slots are left as unknown
const candleSchema = z.tuple([
    z.number(), z.number(), z.number(), z.number(), z.number(), z.number(),
]).rest(z.unknown()).transform(([mts, open, close, high, low, volume]): Candle => ({
    mts, open, close, high, low, volume,
}));

const offerSchema = z.tuple([
    z.number(),             // ID
    z.string(),             // SYMBOL
    z.number(),             // MTS_CREATED
    z.number(),             // MTS_UPDATED
    z.number(),             // AMOUNT
    z.number(),             // AMOUNT_ORIG
    z.string(),             // OFFER_TYPE
    z.unknown(),
    z.unknown(),
    z.unknown(),            // FLAGS
    z.string(),             // OFFER_STATUS
    z.unknown(),
    z.unknown(),
    z.unknown(),
    z.number(),             // RATE
    z.number(),             // PERIOD
]).rest(z.unknown()).transform((row): FundingOffer => ({
    id: row[0],
    symbol: row[1],
    mtsCreated: row[2],
    amount: row[4],
    type: row[6],
    status: row[10],
    rate: row[14],
    period: row[15],
}));

const notificationSchema = z.tuple([
    z.number(),             // MTS
    z.string(),             // TYPE
    z.unknown(),            // MESSAGE_ID
    z.unknown(),
    z.unknown(),            // NOTIFY_INFO
    z.unknown(),            // CODE
    z.string(),             // STATUS
    z.string().nullable(),  // TEXT
]).rest(z.unknown()).transform((row): OfferNotification => {
    const offer = offerSchema.safeParse(row[4]);
    return {
        status: row[6],
        text: row[7] ?? '',
        offer: offer.success ? offer.data : null,
    };
});

const walletSchema = z.tuple([
    z.string(),             // WALLET_TYPE
    z.string(),             // CURRENCY
    z.number(),             // BALANCE
    z.unknown(),            // UNSETTLED_INTEREST
    z.number().nullable(),  // AVAILABLE_BALANCE
]).rest(z.unknown()).transform(([type, currency, balance, , balanceAvailable]): FundingWallet => ({
    type, currency, balance, balanceAvailable,
}));

const creditSchema = z.tuple([
    z.number(),             // ID
    z.string(),             // SYMBOL
    z.unknown(),            // SIDE
    z.unknown(),            // MTS_CREATE
    z.unknown(),            // MTS_UPDATE
    z.number(),             // AMOUNT
    z.unknown(),            // FLAGS
    z.unknown(),            // STATUS
    z.unknown(),            // RATE_TYPE
    z.unknown(),
    z.unknown(),
    z.number(),             // RATE
    z.number(),             // PERIOD
]).rest(z.unknown()).transform((row): FundingCredit => ({
    id: row[0],
    symbol: row[1],
    amount: row[5],
    rate: row[11],
    period: row[12],
}));

const fundingTickerSchema = z.tuple([
    z.number(),             // FRR
    z.number(),             // BID
    z.number(),             // BID_PERIOD
    z.number(),             // BID_SIZE
    z.number(),             // ASK
    z.number(),             // ASK_PERIOD
    z.number(),             // ASK_SIZE
    z.number(),             // DAILY_CHANGE
    z.number(),             // DAILY_CHANGE_RELATIVE
    z.number(),             // LAST_PRICE
    z.number(),             // VOLUME
]).rest(z.unknown()).transform((row): FundingTicker => ({
    frr: row[0],
    bid: row[1],
    bidPeriod: row[2],
    ask: row[4],
    askPeriod: row[5],
    lastPrice: row[9],
    volume: row[10],
}));

const errorPayloadSchema = z.tuple([z.literal('error'), z.number(), z.string()]).rest(z.unknown());

export interface BitfinexRestClientOptions {
    apiKey: string;
    apiSecret: string;
    publicBaseUrl?: string;
    authBaseUrl?: string;
}

/**
 * Bitfinex REST v2 client covering the funding endpoints
 */
export class BitfinexRestClient implements FundingExchange {
    private readonly apiKey: string;
    private readonly apiSecret: string;
    private readonly publicBaseUrl: string;
    private readonly authBaseUrl: string;
    private lastNonce = 0;

    constructor(options: BitfinexRestClientOptions) {
        this.apiKey = options.apiKey;
        this.apiSecret = options.apiSecret;
        this.publicBaseUrl = options.publicBaseUrl ?? PUBLIC_BASE_URL;
        this.authBaseUrl = options.authBaseUrl ?? AUTH_BASE_URL;
    }

    async getPublicCandles(key: string, query: CandleQuery): Promise<Candle[]> {
        const params = new URLSearchParams();
        if (query.start !== undefined) params.set('start', String(query.start));
        if (query.end !== undefined) params.set('end', String(query.end));
        if (query.limit !== undefined) params.set('limit', String(query.limit));

        const qs = params.toString();
        const path = `v2/candles/trade:${query.timeframe}:${key}/hist${qs ? `?${qs}` : ''}`;
        const body = await this.publicGet(path);
        return z.array(candleSchema).parse(body);
    }

    async getPublicTicker(symbol: string): Promise<FundingTicker> {
        const body = await this.publicGet(`v2/ticker/${symbol}`);
        return fundingTickerSchema.parse(body);
    }

    async getWallets(): Promise<FundingWallet[]> {
        const body = await this.authPost('v2/auth/r/wallets', {});
        return z.array(walletSchema).parse(body);
    }

    async getFundingOffers(symbol: string): Promise<FundingOffer[]> {
        const body = await this.authPost(`v2/auth/r/funding/offers/${symbol}`, {});
        return z.array(offerSchema).parse(body);
    }

    async getFundingCredits(symbol: string): Promise<FundingCredit[]> {
        const body = await this.authPost(`v2/auth/r/funding/credits/${symbol}`, {});
        return z.array(creditSchema).parse(body);
    }

    async submitFundingOffer(request: FundingOfferRequest): Promise<OfferNotification> {
        const body = await this.authPost('v2/auth/w/funding/offer/submit', {
            type: request.type,
            symbol: request.symbol,
            amount: String(request.amount),
            rate: String(request.rate),
            period: request.period,
            flags: 0,
        });
        return notificationSchema.parse(body);
    }

    async cancelFundingOffer(id: number): Promise<OfferNotification> {
        const body = await this.authPost('v2/auth/w/funding/offer/cancel', { id });
        return notificationSchema.parse(body);
    }

    private async publicGet(path: string): Promise<unknown> {
        const url = `${this.publicBaseUrl}/${path}`;

        logger.debug('bfx.request', { method: 'GET', path });

        const response = await fetch(url);
        return this.readBody(response, path);
    }

    private async authPost(path: string, payload: Record<string, unknown>): Promise<unknown> {
        const nonce = this.nextNonce();
        const body = JSON.stringify(payload);
        const signature = createHmac('sha384', this.apiSecret)
            .update(`/api/${path}${nonce}${body}`)
            .digest('hex');

        logger.debug('bfx.request', { method: 'POST', path });

        const response = await fetch(`${this.authBaseUrl}/${path}`, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                'bfx-nonce': nonce,
                'bfx-apikey': this.apiKey,
                'bfx-signature': signature,
            },
            body,
        });
        return this.readBody(response, path);
    }

    private async readBody(response: Response, path: string): Promise<unknown> {
        const text = await response.text();
        const body = this.parseJson(text);

        const apiError = errorPayloadSchema.safeParse(body);
        if (apiError.success) {
            const [, code, message] = apiError.data;
            throw new BitfinexApiError(`Bitfinex API error on ${path}: ${message}`, response.status, code);
        }

        if (!response.ok) {
            throw new BitfinexApiError(
                `Bitfinex API error on ${path}: ${response.status} ${response.statusText}`,
                response.status,
            );
        }

        return body;
    }

    private parseJson(text: string): unknown {
        try {
            return JSON.parse(text);
        } catch {
            return text;
        }
    }

    /**
     * Nonces must strictly increase per API key
     */
    private nextNonce(): string {
        const candidate = Date.now() * 1000;
        this.lastNonce = candidate > this.lastNonce ? candidate : this.lastNonce + 1;
        return String(this.lastNonce);
    }
}
