import type { FundingConfig } from '../../src/config/funding.js';

export function testConfig(overrides: Partial<FundingConfig> = {}): FundingConfig {
    return {
        symbol: 'fUSD',
        currency: 'USD',
        sizing: { maxOfferAmount: 1000, minOfferAmount: 150, minTradableAmount: 1 },
        policy: 'yield',
        yieldPolicy: { minRate: 0.0001, rateIncrementPerDay: 0.00003 },
        bucketPolicy: {
            minRate30d: 0.0005,
            minRate7d: 0.0003,
            minRate4to6d: 0.0002,
            minRate2to3d: 0.00015,
            floorRate: 0.0001,
        },
        floating: { keepExisting: true, enabled: false, period: 30 },
        feeRate: null,
        dryRun: false,
        ...overrides,
    };
}
