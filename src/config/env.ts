import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
loadEnv();

// Scripts that only touch public endpoints run without credentials
const scriptPath = process.argv[1] || '';
const isPublicScript = scriptPath.includes('show_strategy');

const booleanFlag = (fallback: 'true' | 'false') =>
    z.enum(['true', 'false']).transform(val => val === 'true').default(fallback);

const rate = z.coerce.number().nonnegative().finite();

// Define the schema for environment variables
export const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    LOG_TO_FILE: booleanFlag('true'),
    LOG_DIR: z.string().default('./logs'),

    // Bitfinex credentials
    BFX_API_KEY: z.string().default(''),
    BFX_API_SECRET: z.string().default(''),

    // Funding market
    FUNDING_SYMBOL: z.string().default('fUSD'),
    FUNDING_CURRENCY: z.string().default('USD'),

    // Offer sizing
    MAX_OFFER_AMOUNT: z.coerce.number().positive().finite().default(1000),
    MIN_OFFER_AMOUNT: z.coerce.number().positive().finite().default(150),
    MIN_TRADABLE_AMOUNT: z.coerce.number().nonnegative().finite().default(1),

    // Strategy selection
    STRATEGY_POLICY: z.enum(['yield', 'bucket']).default('yield'),
    YIELD_MIN_RATE: rate.default(0.0001),
    YIELD_RATE_INCREMENT_PER_DAY: rate.default(0.00003),
    BUCKET_MIN_RATE_30D: rate.default(0.0005),
    BUCKET_MIN_RATE_7D: rate.default(0.0003),
    BUCKET_MIN_RATE_4_6D: rate.default(0.0002),
    BUCKET_MIN_RATE_2_3D: rate.default(0.00015),
    BUCKET_FLOOR_RATE: rate.default(0.0001),

    // Floating (FRR) offers
    KEEP_FLOATING_OFFERS: booleanFlag('true'),
    FLOATING_OFFER_ENABLED: booleanFlag('false'),
    FLOATING_OFFER_PERIOD: z.coerce.number().int().min(2).max(30).default(30),

    // Stats
    STATS_FEE_DEDUCTION_ENABLED: booleanFlag('true'),
    BITFINEX_FEE_RATE: z.coerce.number().min(0).max(1).default(0.15),

    // Scheduling
    RECONCILE_INTERVAL_MS: z.coerce.number().int().positive().finite().default(60000),
    STATS_INTERVAL_MS: z.coerce.number().int().positive().finite().default(3600000),
    JOB_MAX_BACKOFF_MS: z.coerce.number().int().positive().finite().default(600000),

    DRY_RUN: booleanFlag('false'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Cross-field checks the schema cannot express per variable.
 * Returns one message per violated rule.
 */
export function checkEnvConsistency(parsed: Env, requireCredentials: boolean): string[] {
    const problems: string[] = [];

    if (requireCredentials && (!parsed.BFX_API_KEY || !parsed.BFX_API_SECRET)) {
        problems.push('BFX_API_KEY / BFX_API_SECRET: Required for bot mode');
    }

    if (parsed.FLOATING_OFFER_ENABLED && !parsed.KEEP_FLOATING_OFFERS) {
        problems.push('FLOATING_OFFER_ENABLED: Requires KEEP_FLOATING_OFFERS=true, otherwise the floating offer is cancelled every cycle');
    }

    if (parsed.MIN_OFFER_AMOUNT * 2 > parsed.MAX_OFFER_AMOUNT) {
        problems.push('MAX_OFFER_AMOUNT: Must be at least twice MIN_OFFER_AMOUNT');
    }

    if (parsed.MIN_TRADABLE_AMOUNT >= parsed.MIN_OFFER_AMOUNT) {
        problems.push('MIN_TRADABLE_AMOUNT: Must be below MIN_OFFER_AMOUNT');
    }

    return problems;
}

// Parse and validate environment variables
function validateEnv(): Env {
    try {
        const parsed = envSchema.parse(process.env);
        const requireCredentials = !isPublicScript && parsed.NODE_ENV !== 'test';
        const problems = checkEnvConsistency(parsed, requireCredentials);

        if (problems.length > 0) {
            console.error('❌ Invalid environment variables:');
            problems.forEach(problem => {
                console.error(`  - ${problem}`);
            });
            console.error('');
            process.exit(1);
        }

        return parsed;
    } catch (error) {
        if (error instanceof z.ZodError) {
            console.error('❌ Invalid environment variables:');
            error.errors.forEach(err => {
                console.error(`  - ${err.path.join('.')}: ${err.message}`);
            });
            process.exit(1);
        }
        throw error;
    }
}

// Export validated environment configuration
export const env = validateEnv();
