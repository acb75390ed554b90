import { errorMessage, logger } from './logger.js';

export interface IntervalJobOptions {
    name: string;
    intervalMs: number;
    maxBackoffMs: number;
    runImmediately?: boolean;
}

/**
 * Fixed-interval runner that never overlaps with itself.
 * The next run is scheduled only after the current one settles; failures back off exponentially.
 */
export class IntervalJob {
    private timer: NodeJS.Timeout | null = null;
    private inFlight = false;
    private isRunning = false;
    private consecutiveErrors = 0;
    private currentBackoffMs = 0;

    constructor(
        private readonly task: () => Promise<unknown>,
        private readonly options: IntervalJobOptions,
    ) {}

    public start(): void {
        if (this.isRunning) {
            logger.warn('job.already_running', { job: this.options.name });
            return;
        }

        this.isRunning = true;
        this.consecutiveErrors = 0;
        this.currentBackoffMs = 0;

        logger.info('job.started', {
            job: this.options.name,
            intervalMs: this.options.intervalMs,
        });

        this.schedule(this.options.runImmediately ? 0 : this.options.intervalMs);
    }

    public stop(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }

        this.isRunning = false;

        logger.info('job.stopped', { job: this.options.name });
    }

    public get errorCount(): number {
        return this.consecutiveErrors;
    }

    public get nextDelayMs(): number {
        return this.currentBackoffMs > 0 ? this.currentBackoffMs : this.options.intervalMs;
    }

    private schedule(delay: number): void {
        if (!this.isRunning) {
            return;
        }

        this.timer = setTimeout(() => {
            void this.tick();
        }, delay);
    }

    private async tick(): Promise<void> {
        await this.runOnce();
        this.schedule(this.nextDelayMs);
    }

    /**
     * Run the task once unless a run is already in flight
     */
    public async runOnce(): Promise<void> {
        if (this.inFlight) {
            logger.warn('job.skipped', {
                job: this.options.name,
                reason: 'previous run still in flight',
            });
            return;
        }

        this.inFlight = true;
        const startedAt = Date.now();

        try {
            await this.task();
            this.consecutiveErrors = 0;
            this.currentBackoffMs = 0;

            logger.debug('job.completed', {
                job: this.options.name,
                durationMs: Date.now() - startedAt,
            });
        } catch (error) {
            this.handleError(error);
        } finally {
            this.inFlight = false;
        }
    }

    private handleError(error: unknown): void {
        this.consecutiveErrors++;

        const backoffMs = Math.min(
            this.options.intervalMs * Math.pow(2, this.consecutiveErrors - 1),
            this.options.maxBackoffMs
        );
        this.currentBackoffMs = backoffMs;

        logger.error('job.error', {
            job: this.options.name,
            error: errorMessage(error),
            consecutiveErrors: this.consecutiveErrors,
            nextDelayMs: backoffMs,
        });
    }
}
