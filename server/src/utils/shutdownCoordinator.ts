/**
 * Shutdown Coordinator
 *
 * Runs registered cleanup handlers (each with its own timeout) when the
 * process receives SIGINT/SIGTERM, so the poll loop can finish its current
 * step and exit on its own. A repeated signal forces the process out.
 */

import logger from './logger.js';
import { getErrorMessage } from './errors.js';

const shutdownLogger = logger.child({ module: 'shutdown' });

// ============================================
// TYPE DEFINITIONS
// ============================================

interface ShutdownHandler {
    name: string;
    handler: () => Promise<void> | void;
    timeout: number;
}

export interface ShutdownReport {
    name: string;
    success: boolean;
    error?: string;
    durationMs: number;
}

// ============================================
// SHUTDOWN COORDINATOR CLASS
// ============================================

export type ForceExit = (signal: NodeJS.Signals) => void;

const defaultForceExit: ForceExit = (signal) => {
    process.exit(signal === 'SIGINT' ? 130 : 143);
};

export class ShutdownCoordinator {
    private handlers: Map<string, ShutdownHandler> = new Map();
    private isShuttingDown = false;
    private readonly forceExit: ForceExit;

    /**
     * @param forceExit - Called on a repeated signal while shutdown is running
     */
    constructor(forceExit: ForceExit = defaultForceExit) {
        this.forceExit = forceExit;
    }

    /**
     * @param timeout - Max time to wait for handler (ms), default 10s
     */
    register(name: string, handler: () => Promise<void> | void, timeout = 10000): void {
        if (this.handlers.has(name)) {
            shutdownLogger.warn({ name }, 'Shutdown handler already registered, replacing');
        }
        this.handlers.set(name, { name, handler, timeout });
    }

    unregister(name: string): void {
        this.handlers.delete(name);
    }

    isInProgress(): boolean {
        return this.isShuttingDown;
    }

    /**
     * Execute all shutdown handlers in parallel, each bounded by its timeout.
     * A second call while shutting down is a no-op.
     */
    async shutdown(reason = 'manual'): Promise<ShutdownReport[]> {
        if (this.isShuttingDown) {
            shutdownLogger.warn('Shutdown already in progress');
            return [];
        }

        this.isShuttingDown = true;
        shutdownLogger.info({ reason, handlerCount: this.handlers.size }, 'Starting graceful shutdown');

        const reports = await Promise.all(
            Array.from(this.handlers.values()).map(h => this.runHandler(h))
        );

        const failed = reports.filter(r => !r.success).length;
        shutdownLogger.info({ successful: reports.length - failed, failed }, 'Shutdown complete');
        return reports;
    }

    /**
     * First signal starts a graceful shutdown; any later signal exits the
     * process immediately.
     */
    handleSignal(signal: NodeJS.Signals): void {
        if (this.isShuttingDown) {
            shutdownLogger.warn({ signal }, 'Second signal during shutdown, exiting now');
            this.forceExit(signal);
            return;
        }
        this.shutdown(signal).catch((error: unknown) => {
            shutdownLogger.error({ error: getErrorMessage(error) }, 'Shutdown failed');
        });
    }

    /**
     * Wire SIGINT/SIGTERM to handleSignal(). Returns a function that removes the listeners.
     */
    installSignalHandlers(): () => void {
        const onSignal = (signal: NodeJS.Signals): void => this.handleSignal(signal);
        process.on('SIGINT', onSignal);
        process.on('SIGTERM', onSignal);
        return () => {
            process.off('SIGINT', onSignal);
            process.off('SIGTERM', onSignal);
        };
    }

    private async runHandler({ name, handler, timeout }: ShutdownHandler): Promise<ShutdownReport> {
        const start = Date.now();
        let expire: () => void = () => {};
        const timedOut = new Promise<'timeout'>(resolve => {
            expire = () => resolve('timeout');
        });
        const timer = setTimeout(() => expire(), timeout);

        try {
            const outcome = await Promise.race([
                (async () => {
                    await handler();
                    return 'done' as const;
                })(),
                timedOut,
            ]);

            const durationMs = Date.now() - start;
            if (outcome === 'timeout') {
                shutdownLogger.warn({ name, timeout, durationMs }, 'Shutdown handler timed out');
                return { name, success: false, error: 'Timeout', durationMs };
            }
            shutdownLogger.debug({ name, durationMs }, 'Shutdown handler completed');
            return { name, success: true, durationMs };
        } catch (error: unknown) {
            const durationMs = Date.now() - start;
            shutdownLogger.error({ name, error: getErrorMessage(error), durationMs }, 'Shutdown handler failed');
            return { name, success: false, error: getErrorMessage(error), durationMs };
        } finally {
            clearTimeout(timer);
        }
    }
}
