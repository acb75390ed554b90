import { env } from '../config/env.js';
import { fundingConfigFromEnv } from '../config/funding.js';
import { BitfinexRestClient } from '../data/bitfinex/rest_client.js';
import { RateObserver } from '../strategy/rate_observer.js';
import { StrategySelector, selectStrategy } from '../strategy/selector.js';
import { qualifyingCandidates, yieldFloorRate } from '../strategy/yield_policy.js';
import { selectByBucketsDetailed } from '../strategy/bucket_policy.js';
import { planReconciliation } from '../funding/offer_plan.js';
import { annualYield, type FundingStrategy, type MarketSnapshot } from '../strategy/types.js';

// Optional balance to preview offer splitting: npm run strategy:show -- 2500
const previewBalance = process.argv[2] !== undefined ? Number(process.argv[2]) : null;

if (previewBalance !== null && (!Number.isFinite(previewBalance) || previewBalance < 0)) {
    console.error(`❌ Error: preview balance must be a non-negative number, got "${process.argv[2]}"`);
    process.exit(1);
}

function formatRate(rate: number | null): string {
    return rate === null ? 'no volume' : `${(rate * 100).toFixed(5)}%/day`;
}

function displaySnapshot(snapshot: MarketSnapshot): void {
    for (const [period, rate] of snapshot) {
        const yearly = rate === null ? '' : `  (APY ${(annualYield(rate, period) * 100).toFixed(2)}%)`;
        console.log(`   ${String(period).padStart(2)}d  ${formatRate(rate)}${yearly}`);
    }
}

function displayStrategy(strategy: FundingStrategy): void {
    console.log(`   ➡️  ${strategy.type} ${formatRate(strategy.rate)} for ${strategy.period} days`);
}

async function main() {
    const config = fundingConfigFromEnv(env);

    // Public endpoints only; no credentials involved
    const client = new BitfinexRestClient({ apiKey: '', apiSecret: '' });
    const selector = new StrategySelector(new RateObserver(client, config.symbol), config);

    console.log(`🔍 Observing ${config.symbol} funding markets...\n`);

    try {
        const yieldSnapshot = await selector.observe('yield');
        console.log('📈 Yield policy (1h of 5m candles):');
        displaySnapshot(yieldSnapshot);
        console.log(`   Floor: ${formatRate(yieldFloorRate(yieldSnapshot, config.yieldPolicy))}`);
        console.log(`   Qualifying: ${qualifyingCandidates(yieldSnapshot, config.yieldPolicy).map(c => `${c.period}d`).join(', ') || 'none'}`);
        const yieldStrategy = selectStrategy('yield', yieldSnapshot, config);
        displayStrategy(yieldStrategy);

        const bucketSnapshot = await selector.observe('bucket');
        console.log('\n🪣 Bucket policy (15m of 1m candles):');
        displaySnapshot(bucketSnapshot);
        const { bucket, strategy: bucketStrategy } = selectByBucketsDetailed(bucketSnapshot, config.bucketPolicy);
        console.log(`   Bucket: ${bucket}`);
        displayStrategy(bucketStrategy);

        const active = config.policy === 'yield' ? yieldStrategy : bucketStrategy;
        console.log(`\n✅ Configured policy: ${config.policy}`);

        if (previewBalance !== null) {
            const plan = planReconciliation([], active, previewBalance, config.sizing, config.floating);
            console.log(`\n💵 Offers for a balance of ${previewBalance}:`);
            if (plan.floatingAmount !== null) {
                console.log(`   FRRDELTAVAR ${plan.floatingAmount} for ${config.floating.period} days`);
            }
            plan.offerAmounts.forEach(amount => {
                console.log(`   ${active.type} ${amount} at ${formatRate(active.rate)} for ${active.period} days`);
            });
            if (plan.floatingAmount === null && plan.offerAmounts.length === 0) {
                console.log(`   none (below minimum offer of ${config.sizing.minOfferAmount})`);
            }
        }
        console.log('');
    } catch (error) {
        console.error('❌ Error observing funding markets:', error instanceof Error ? error.message : String(error));
        process.exit(1);
    }
}

void main();
