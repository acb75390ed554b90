import { env } from './config/env.js';
import { fundingConfigFromEnv } from './config/funding.js';
import { errorMessage, logger } from './infra/logger.js';
import { IntervalJob } from './infra/interval_job.js';
import { BitfinexRestClient } from './data/bitfinex/rest_client.js';
import { RateObserver } from './strategy/rate_observer.js';
import { StrategySelector } from './strategy/selector.js';
import { OfferReconciler } from './funding/reconciler.js';
import { StatsReporter } from './stats/stats_reporter.js';

// Global references to keep process alive
let reconcileJob: IntervalJob | null = null;
let statsJob: IntervalJob | null = null;

/**
 * Main application entry point
 */
async function main() {
    logger.info('app.boot', {
        message: 'Application starting...',
        environment: env.NODE_ENV,
    });

    const config = fundingConfigFromEnv(env);

    console.log('\n✅ Boot OK');
    console.log(`⏰ Timestamp: ${new Date().toISOString()}`);
    console.log(`🌍 Environment: ${env.NODE_ENV}`);
    console.log(`📝 Log Level: ${env.LOG_LEVEL}`);
    console.log(`💾 Log to File: ${env.LOG_TO_FILE ? 'Enabled' : 'Disabled'}`);
    console.log(`\n💵 Funding Market:`);
    console.log(`  📊 Symbol: ${config.symbol} (${config.currency} funding wallet)`);
    console.log(`  📏 Offer Size: ${config.sizing.minOfferAmount} - ${config.sizing.maxOfferAmount}`);
    console.log(`  🧹 Dust Threshold: ${config.sizing.minTradableAmount}`);
    console.log(`\n🎯 Strategy:`);
    console.log(`  🧭 Policy: ${config.policy}`);
    console.log(`  🌊 Floating Offer: ${config.floating.enabled ? `Enabled (${config.floating.period}d)` : 'Disabled'}`);
    console.log(`  🛟 Keep Floating Offers: ${config.floating.keepExisting ? 'Yes' : 'No'}`);
    console.log(`  🧪 Dry Run: ${config.dryRun ? 'Yes' : 'No'}`);
    console.log(`\n⏱️  Schedule:`);
    console.log(`  🔁 Reconcile: ${env.RECONCILE_INTERVAL_MS}ms`);
    console.log(`  📈 Stats: ${env.STATS_INTERVAL_MS}ms\n`);

    const client = new BitfinexRestClient({
        apiKey: env.BFX_API_KEY,
        apiSecret: env.BFX_API_SECRET,
    });

    const selector = new StrategySelector(new RateObserver(client, config.symbol), config);
    const reconciler = new OfferReconciler(client, selector, config);
    const reporter = new StatsReporter(client, config);

    reconcileJob = new IntervalJob(() => reconciler.runCycle(), {
        name: 'reconcile',
        intervalMs: env.RECONCILE_INTERVAL_MS,
        maxBackoffMs: env.JOB_MAX_BACKOFF_MS,
        runImmediately: true,
    });
    reconcileJob.start();

    statsJob = new IntervalJob(() => reporter.runCycle(), {
        name: 'stats',
        intervalMs: env.STATS_INTERVAL_MS,
        maxBackoffMs: env.JOB_MAX_BACKOFF_MS,
        runImmediately: true,
    });
    statsJob.start();

    logger.info('app.ready', {
        message: 'Application initialized successfully',
        jobs: ['reconcile', 'stats'],
    });
}

/**
 * Graceful shutdown handler
 */
function gracefulShutdown(signal: string) {
    logger.info('app.shutdown', {
        message: `Received ${signal}, shutting down gracefully...`,
    });

    if (reconcileJob) {
        reconcileJob.stop();
    }

    if (statsJob) {
        statsJob.stop();
    }

    setTimeout(() => {
        process.exit(0);
    }, 1000);
}

process.on('SIGINT', () => gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));

main().catch((error) => {
    logger.error('app.fatal', {
        message: 'Fatal error during application startup',
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
});
