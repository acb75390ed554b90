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

/**
 * Exchange operations the lending cycles depend on
 */
export interface FundingExchange {
    getFundingOffers(symbol: string): Promise<FundingOffer[]>;
    submitFundingOffer(request: FundingOfferRequest): Promise<OfferNotification>;
    cancelFundingOffer(id: number): Promise<OfferNotification>;
    getPublicCandles(key: string, query: CandleQuery): Promise<Candle[]>;
    getPublicTicker(symbol: string): Promise<FundingTicker>;
    getWallets(): Promise<FundingWallet[]>;
    getFundingCredits(symbol: string): Promise<FundingCredit[]>;
}

/**
 * Thrown when the account has no funding wallet for the configured currency
 */
export class FundingWalletNotFoundError extends Error {
    constructor(public readonly currency: string) {
        super(`No funding wallet for ${currency}`);
        this.name = 'FundingWalletNotFoundError';
    }
}

function findFundingWallet(wallets: FundingWallet[], currency: string): FundingWallet {
    const wallet = wallets.find(w => w.type === 'funding' && w.currency === currency);
    if (!wallet) {
        throw new FundingWalletNotFoundError(currency);
    }
    return wallet;
}

/**
 * Lendable balance of the funding wallet.
 * Null while Bitfinex has not calculated AVAILABLE_BALANCE yet.
 */
export async function getAvailableBalance(exchange: FundingExchange, currency: string): Promise<number | null> {
    const wallet = findFundingWallet(await exchange.getWallets(), currency);
    return wallet.balanceAvailable;
}

export async function getTotalBalance(exchange: FundingExchange, currency: string): Promise<number> {
    const wallet = findFundingWallet(await exchange.getWallets(), currency);
    return wallet.balance;
}
