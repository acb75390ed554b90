import { describe, it, expect, afterEach, vi } from 'vitest';
import { IntervalJob } from '../src/infra/interval_job.js';

describe('IntervalJob', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('runs on start and then once per interval until stopped', async () => {
        vi.useFakeTimers();
        const task = vi.fn().mockResolvedValue(undefined);
        const job = new IntervalJob(task, { name: 'test', intervalMs: 1000, maxBackoffMs: 5000, runImmediately: true });

        job.start();
        await vi.advanceTimersByTimeAsync(1);
        expect(task).toHaveBeenCalledTimes(1);

        await vi.advanceTimersByTimeAsync(1000);
        expect(task).toHaveBeenCalledTimes(2);

        job.stop();
        await vi.advanceTimersByTimeAsync(5000);
        expect(task).toHaveBeenCalledTimes(2);
    });

    it('waits a full interval first without runImmediately', async () => {
        vi.useFakeTimers();
        const task = vi.fn().mockResolvedValue(undefined);
        const job = new IntervalJob(task, { name: 'test', intervalMs: 1000, maxBackoffMs: 5000 });

        job.start();
        await vi.advanceTimersByTimeAsync(999);
        expect(task).not.toHaveBeenCalled();

        await vi.advanceTimersByTimeAsync(1);
        expect(task).toHaveBeenCalledTimes(1);
        job.stop();
    });

    it('never overlaps a run that is still in flight', async () => {
        let release: () => void = () => undefined;
        const task = vi.fn(() => new Promise<void>(resolve => {
            release = resolve;
        }));
        const job = new IntervalJob(task, { name: 'test', intervalMs: 1000, maxBackoffMs: 5000 });

        const first = job.runOnce();
        await job.runOnce();
        expect(task).toHaveBeenCalledTimes(1);

        release();
        await first;
        await job.runOnce();
        expect(task).toHaveBeenCalledTimes(2);
    });

    it('backs off after failures and resets on success', async () => {
        const task = vi.fn()
            .mockRejectedValueOnce(new Error('boom'))
            .mockRejectedValueOnce(new Error('boom'))
            .mockRejectedValueOnce(new Error('boom'))
            .mockResolvedValue(undefined);
        const job = new IntervalJob(task, { name: 'test', intervalMs: 1000, maxBackoffMs: 3000 });

        await job.runOnce();
        expect(job.errorCount).toBe(1);
        expect(job.nextDelayMs).toBe(1000);

        await job.runOnce();
        expect(job.nextDelayMs).toBe(2000);

        await job.runOnce();
        expect(job.errorCount).toBe(3);
        expect(job.nextDelayMs).toBe(3000);

        await job.runOnce();
        expect(job.errorCount).toBe(0);
        expect(job.nextDelayMs).toBe(1000);
    });
});
