/**
 * Poll Scheduler
 *
 * Running → Idle after every cycle; Idle → Running when the sleep elapses.
 * `runOnce` and `wait` are separate so callers (and tests) can drive a single
 * cycle; `start` composes them into the unbounded loop until `stop` is called.
 */

import type { ConsolidationConfig } from '../../config/index.js';
import { RECENT_RUNS_LIMIT } from '../../config/sync/consolidation.js';
import { schedulerLogger } from '../../utils/logger.js';
import type { CycleRunner } from './consolidationEngine.js';
import type { CycleResult } from './types.js';

// ============================================
// TYPES
// ============================================

export type SchedulerState = 'idle' | 'running' | 'stopped';

export type SchedulerTiming = Pick<ConsolidationConfig, 'idleIntervalMs' | 'emptyCatalogRetryMs'>;

export interface SchedulerStatus {
    state: SchedulerState;
    schedulerActive: boolean;
    totalRuns: number;
    lastRunAt: string | null;
    nextRunAt: string | null;
    recentRuns: CycleResult[];
}

// ============================================
// SCHEDULER
// ============================================

export class PollScheduler {
    private readonly runner: CycleRunner;
    private readonly timing: SchedulerTiming;

    private state: SchedulerState = 'idle';
    private active = false;
    private totalRuns = 0;
    private lastRunAt: string | null = null;
    private nextRunAt: string | null = null;
    private recentRuns: CycleResult[] = [];

    private sleepTimer: ReturnType<typeof setTimeout> | null = null;
    private wakeUp: (() => void) | null = null;

    constructor(runner: CycleRunner, timing: SchedulerTiming) {
        this.runner = runner;
        this.timing = timing;
    }

    /**
     * Run one consolidation cycle.
     * @returns null when a cycle is already in progress
     */
    async runOnce(): Promise<CycleResult | null> {
        if (this.state === 'running') {
            schedulerLogger.debug('Consolidation cycle already in progress, skipping');
            return null;
        }

        this.state = 'running';
        try {
            const result = await this.runner.runCycle();
            this.totalRuns++;
            this.lastRunAt = new Date().toISOString();
            this.recentRuns = [result, ...this.recentRuns].slice(0, RECENT_RUNS_LIMIT);
            return result;
        } finally {
            this.state = 'idle';
        }
    }

    /**
     * Idle time after a cycle: the retry interval when the catalog was empty,
     * otherwise the regular idle interval.
     */
    nextDelay(result: CycleResult | null): number {
        if (result !== null && result.error === null && result.sourcesFound === 0) {
            return this.timing.emptyCatalogRetryMs;
        }
        return this.timing.idleIntervalMs;
    }

    /**
     * Sleep for `ms`; resolves early when the scheduler is stopped.
     */
    wait(ms: number): Promise<void> {
        return new Promise(resolve => {
            this.wakeUp = resolve;
            this.sleepTimer = setTimeout(() => {
                this.sleepTimer = null;
                this.wakeUp = null;
                resolve();
            }, ms);
        });
    }

    /**
     * Loop runOnce → wait until stop() is called. Resolves once the loop exits.
     */
    async start(): Promise<void> {
        if (this.active) {
            schedulerLogger.debug('Scheduler already running');
            return;
        }

        this.active = true;
        schedulerLogger.info(
            { idleIntervalMs: this.timing.idleIntervalMs, emptyCatalogRetryMs: this.timing.emptyCatalogRetryMs },
            'Starting scheduler'
        );

        while (this.active) {
            const result = await this.runOnce();
            if (!this.active) break;

            const delay = this.nextDelay(result);
            this.nextRunAt = new Date(Date.now() + delay).toISOString();
            schedulerLogger.info(
                { delayMs: delay, nextRunAt: this.nextRunAt, emptyCatalog: result?.sourcesFound === 0 },
                'Sleeping until the next run'
            );
            await this.wait(delay);
        }

        this.nextRunAt = null;
        this.state = 'stopped';
        schedulerLogger.info('Scheduler stopped');
    }

    /**
     * Stop the loop after the current cycle, cancelling any pending sleep.
     */
    stop(): void {
        this.active = false;
        if (this.sleepTimer) {
            clearTimeout(this.sleepTimer);
            this.sleepTimer = null;
        }
        if (this.wakeUp) {
            const wake = this.wakeUp;
            this.wakeUp = null;
            wake();
        }
    }

    getStatus(): SchedulerStatus {
        return {
            state: this.state,
            schedulerActive: this.active,
            totalRuns: this.totalRuns,
            lastRunAt: this.lastRunAt,
            nextRunAt: this.nextRunAt,
            recentRuns: [...this.recentRuns],
        };
    }
}
