/**
 * Consolidation Engine
 *
 * One cycle = load ledger → load catalog → for each source (in catalog order):
 * resolve, read, classify rows, stage new ones → flush every N sources and
 * after the last one.
 *
 * Sources are processed strictly one at a time with a fixed pause after each
 * read to bound the request rate against the spreadsheet API.
 */

import type { ConsolidationConfig } from '../../config/index.js';
import { consolidationLogger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import { resolveSource } from './addressResolver.js';
import { BatchWriter } from './batchWriter.js';
import { fingerprintRow, sourceKeyOf } from './fingerprint.js';
import { FingerprintLedger, type LedgerStore } from './ledger.js';
import { loadSourceCatalog } from './sourceCatalog.js';
import type {
    CycleResult,
    Row,
    SourceReport,
    SourceSeed,
    SpreadsheetService,
} from './types.js';

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export interface ConsolidationEngineOptions {
    config: ConsolidationConfig;
    service: SpreadsheetService;
    ledgerStore: LedgerStore;
    sleep?: Sleep;
}

export interface RunCycleOptions {
    /** Classify rows but never write the destination or the ledger */
    dryRun?: boolean;
}

/** Anything the scheduler can drive */
export interface CycleRunner {
    runCycle(options?: RunCycleOptions): Promise<CycleResult>;
}

export class ConsolidationEngine implements CycleRunner {
    private readonly config: ConsolidationConfig;
    private readonly service: SpreadsheetService;
    private readonly ledgerStore: LedgerStore;
    private readonly sleep: Sleep;

    constructor(options: ConsolidationEngineOptions) {
        this.config = options.config;
        this.service = options.service;
        this.ledgerStore = options.ledgerStore;
        this.sleep = options.sleep ?? defaultSleep;
    }

    async runCycle(options: RunCycleOptions = {}): Promise<CycleResult> {
        const dryRun = options.dryRun ?? false;
        const startTime = Date.now();

        const result: CycleResult = {
            startedAt: new Date().toISOString(),
            dryRun,
            sourcesFound: 0,
            sourcesWithNewRows: 0,
            sourcesSkipped: 0,
            newRows: 0,
            rowsWritten: 0,
            flushes: [],
            sources: [],
            durationMs: 0,
            error: null,
        };

        consolidationLogger.info({ dryRun }, 'Starting consolidation run');

        try {
            const ledger = FingerprintLedger.fromSnapshot(await this.ledgerStore.load());
            const seeds = await loadSourceCatalog(this.service, this.config);
            result.sourcesFound = seeds.length;

            if (seeds.length === 0) {
                consolidationLogger.warn('No appointment URLs to process');
                return result;
            }

            const writer = new BatchWriter({
                service: this.service,
                destination: this.config.destination,
                ledger,
                ledgerStore: this.ledgerStore,
            });

            for (let i = 0; i < seeds.length; i++) {
                const ordinal = i + 1;
                const report = await this.processSource(seeds[i], ordinal, seeds.length, ledger, writer);
                result.sources.push(report);
                result.newRows += report.newRows;
                if (report.outcome === 'new_rows') result.sourcesWithNewRows++;
                if (report.outcome === 'unresolved' || report.outcome === 'read_failed') result.sourcesSkipped++;

                const windowClosed = ordinal % this.config.batchSourceThreshold === 0 || ordinal === seeds.length;
                if (dryRun || !windowClosed || writer.pending.isEmpty()) continue;

                consolidationLogger.info(
                    { processed: ordinal, total: seeds.length, batchRows: writer.pending.size },
                    'Flushing batch of new rows'
                );
                const flush = await writer.flush(ordinal);
                if (flush) {
                    result.flushes.push(flush);
                    if (flush.status !== 'write_failed') result.rowsWritten += flush.rows;
                }
            }

            consolidationLogger.info(
                {
                    sources: result.sourcesFound,
                    newRows: result.newRows,
                    rowsWritten: result.rowsWritten,
                    flushes: result.flushes.length,
                },
                dryRun ? 'Dry run complete, nothing written' : 'Consolidation run complete'
            );
            return result;
        } catch (error: unknown) {
            result.error = getErrorMessage(error);
            consolidationLogger.error({ error: result.error }, 'Consolidation run failed');
            return result;
        } finally {
            result.durationMs = Date.now() - startTime;
        }
    }

    private async processSource(
        seed: SourceSeed,
        ordinal: number,
        total: number,
        ledger: FingerprintLedger,
        writer: BatchWriter
    ): Promise<SourceReport> {
        const report: SourceReport = {
            ordinal,
            displayName: seed.displayName,
            sourceKey: null,
            outcome: 'unresolved',
            newRows: 0,
        };

        consolidationLogger.info({ ordinal, total, company: seed.displayName, url: seed.url }, 'Checking source');

        const source = await resolveSource(this.service, seed);
        if (!source) return report;

        const sourceKey = sourceKeyOf(source);
        report.sourceKey = sourceKey;

        let rows: Row[];
        try {
            consolidationLogger.debug({ tab: source.tabName, tabId: source.tabId }, 'Reading tab');
            rows = await this.service.readRange(source.spreadsheetId, {
                tab: source.tabName,
                startRow: 1,
                startColumn: 0,
                endColumn: this.config.sourceColumnCount - 1,
            });
        } catch (error: unknown) {
            consolidationLogger.error(
                { spreadsheetId: source.spreadsheetId, tab: source.tabName, error: getErrorMessage(error) },
                'Error reading source tab, skipping'
            );
            report.outcome = 'read_failed';
            return report;
        }

        if (rows.length <= 1) {
            consolidationLogger.debug({ company: seed.displayName }, 'No data in sheet');
            report.outcome = 'empty';
            return report;
        }

        const [header, ...dataRows] = rows;
        // Repeats within this fetch are all kept; isPending only sees rows
        // staged by an earlier catalog entry for the same key.
        const fresh: Array<{ fingerprint: string; row: Row }> = [];
        for (const row of dataRows) {
            const fingerprint = fingerprintRow(row);
            if (ledger.contains(sourceKey, fingerprint) || writer.isPending(sourceKey, fingerprint)) {
                continue;
            }
            fresh.push({ fingerprint, row });
        }

        if (fresh.length === 0) {
            consolidationLogger.debug({ company: seed.displayName }, 'No new rows found');
            report.outcome = 'no_new_rows';
            await this.sleep(this.config.sourcePauseMs);
            return report;
        }

        consolidationLogger.info({ company: seed.displayName, newRows: fresh.length }, 'Found new rows to process');

        writer.captureHeader(header);
        for (const { fingerprint, row } of fresh) {
            writer.stage(sourceKey, fingerprint, row, seed.displayName);
        }

        report.outcome = 'new_rows';
        report.newRows = fresh.length;
        await this.sleep(this.config.sourcePauseMs);
        return report;
    }
}
