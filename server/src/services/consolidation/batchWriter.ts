/**
 * Batch Writer
 *
 * Accumulates new rows across sources and flushes them to the destination,
 * inserted directly beneath the header so the newest batch is always on top.
 *
 * Ordering per flush: prepare destination → write rows → commit fingerprints
 * → persist ledger. Fingerprints reach the ledger only after the write has
 * succeeded; a failed write leaves them uncommitted so the rows are found
 * again next cycle.
 */

import type { DestinationConfig } from '../../config/index.js';
import { consolidationLogger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import type { FingerprintLedger, LedgerStore } from './ledger.js';
import type { FlushResult, Row, SpreadsheetService } from './types.js';

// ============================================
// PENDING BATCH
// ============================================

/**
 * Rows awaiting a destination write, plus their fingerprints by source key.
 */
export class PendingBatch {
    private rows: Row[] = [];
    private fingerprints: Map<string, Set<string>> = new Map();

    add(sourceKey: string, fingerprint: string, row: Row): void {
        let set = this.fingerprints.get(sourceKey);
        if (!set) {
            set = new Set();
            this.fingerprints.set(sourceKey, set);
        }
        set.add(fingerprint);
        this.rows.push(row);
    }

    has(sourceKey: string, fingerprint: string): boolean {
        return this.fingerprints.get(sourceKey)?.has(fingerprint) ?? false;
    }

    get size(): number {
        return this.rows.length;
    }

    isEmpty(): boolean {
        return this.rows.length === 0;
    }

    getRows(): Row[] {
        return this.rows.map(r => [...r]);
    }

    fingerprintsBySource(): Map<string, string[]> {
        const out = new Map<string, string[]>();
        for (const [key, set] of this.fingerprints) out.set(key, Array.from(set));
        return out;
    }

    clear(): void {
        this.rows = [];
        this.fingerprints = new Map();
    }
}

// ============================================
// PADDING
// ============================================

/**
 * Right-pad with empty cells to `width`, then append the company name.
 * Rows already at or past `width` are kept as they are.
 */
export function padRow(row: Row, width: number, companyName: string): Row {
    const padded = [...row];
    while (padded.length < width) padded.push('');
    padded.push(companyName);
    return padded;
}

// ============================================
// WRITER
// ============================================

export interface BatchWriterOptions {
    service: SpreadsheetService;
    destination: DestinationConfig;
    ledger: FingerprintLedger;
    ledgerStore: LedgerStore;
}

export class BatchWriter {
    readonly pending = new PendingBatch();

    private readonly service: SpreadsheetService;
    private readonly destination: DestinationConfig;
    private readonly ledger: FingerprintLedger;
    private readonly ledgerStore: LedgerStore;

    /** Source header captured from the first source with new rows */
    private sourceHeader: Row | null = null;
    private destinationPrepared = false;
    private destinationTabId: number | null = null;

    constructor(options: BatchWriterOptions) {
        this.service = options.service;
        this.destination = options.destination;
        this.ledger = options.ledger;
        this.ledgerStore = options.ledgerStore;
    }

    /** First call wins for the lifetime of this writer (one cycle) */
    captureHeader(header: Row): void {
        if (this.sourceHeader === null) {
            this.sourceHeader = [...header];
        }
    }

    /** Source header plus the company name column, or null before any capture */
    getDestinationHeader(): Row | null {
        return this.sourceHeader ? [...this.sourceHeader, this.destination.companyNameHeader] : null;
    }

    isPending(sourceKey: string, fingerprint: string): boolean {
        return this.pending.has(sourceKey, fingerprint);
    }

    /**
     * Pad a new source row to the captured header width, label it, and queue it.
     */
    stage(sourceKey: string, fingerprint: string, row: Row, companyName: string): void {
        const width = this.sourceHeader?.length ?? row.length;
        this.pending.add(sourceKey, fingerprint, padRow(row, width, companyName));
    }

    /**
     * Write the pending batch and then commit + persist its fingerprints.
     * @returns null when there was nothing to flush
     */
    async flush(afterSource: number): Promise<FlushResult | null> {
        if (this.pending.isEmpty()) return null;

        const rows = this.pending.getRows();
        const { spreadsheetId, sheetName } = this.destination;
        let prepended = false;

        try {
            if (!this.destinationPrepared) {
                const header = this.getDestinationHeader();
                if (header) {
                    await this.prepareDestination(header);
                    this.destinationPrepared = true;
                }
            }
            consolidationLogger.info({ rows: rows.length, sheetName }, 'Inserting batch at the top of the target sheet');
            prepended = await this.writeAtTop(rows);
        } catch (error: unknown) {
            consolidationLogger.error(
                { spreadsheetId, sheetName, rows: rows.length, error: getErrorMessage(error) },
                'Batch write failed; fingerprints left uncommitted for next cycle'
            );
            this.pending.clear();
            return { afterSource, status: 'write_failed', rows: rows.length, prepended: false, error: getErrorMessage(error) };
        }

        consolidationLogger.info({ rows: rows.length }, 'Batch written to target sheet');

        for (const [sourceKey, fingerprints] of this.pending.fingerprintsBySource()) {
            this.ledger.commit(sourceKey, fingerprints);
        }
        this.pending.clear();

        try {
            await this.ledgerStore.save(this.ledger.toSnapshot());
            consolidationLogger.info({ fingerprints: this.ledger.totalCount() }, 'Processed entries log updated');
        } catch (error: unknown) {
            consolidationLogger.error(
                { error: getErrorMessage(error) },
                'Ledger persist failed after write; these rows will be delivered again next cycle'
            );
            return { afterSource, status: 'persist_failed', rows: rows.length, prepended, error: getErrorMessage(error) };
        }

        return { afterSource, status: 'written', rows: rows.length, prepended, error: null };
    }

    /**
     * Ensure the destination tab exists and carries a header.
     * The header is written only when A1 is empty.
     */
    private async prepareDestination(header: Row): Promise<void> {
        const { spreadsheetId, sheetName, newTabRowCount, newTabColumnCount } = this.destination;

        const tabs = await this.service.getTabs(spreadsheetId);
        const existing = tabs.find(t => t.title === sheetName);
        if (existing) {
            this.destinationTabId = existing.tabId;
        } else {
            const created = await this.service.createTab(spreadsheetId, sheetName, {
                rowCount: newTabRowCount,
                columnCount: newTabColumnCount,
            });
            this.destinationTabId = created.tabId;
            consolidationLogger.info({ sheetName }, 'Created new tab in target spreadsheet');
        }

        const firstCell = await this.service.readRange(spreadsheetId, {
            tab: sheetName,
            startRow: 1,
            endRow: 1,
            startColumn: 0,
            endColumn: 0,
        });

        if ((firstCell[0]?.[0] ?? '') === '') {
            await this.service.writeRows(spreadsheetId, { tab: sheetName, row: 1, column: 0 }, [header]);
            consolidationLogger.info({ sheetName }, 'Target sheet was empty, so headers were written');
        } else {
            consolidationLogger.info({ sheetName }, 'Target sheet already contains data, headers not written');
        }
    }

    /**
     * @returns true when rows were inserted above existing data
     */
    private async writeAtTop(rows: Row[]): Promise<boolean> {
        const { spreadsheetId, sheetName } = this.destination;
        const anchor = { tab: sheetName, row: 2, column: 0 };

        const columnA = await this.service.readRange(spreadsheetId, {
            tab: sheetName,
            startRow: 1,
            startColumn: 0,
            endColumn: 0,
        });

        if (columnA.length === 0) {
            await this.service.writeRows(spreadsheetId, anchor, rows);
            return false;
        }

        const tabId = await this.resolveDestinationTabId();
        await this.service.insertRows(spreadsheetId, tabId, 1, rows.length);
        await this.service.writeRows(spreadsheetId, anchor, rows);
        return true;
    }

    private async resolveDestinationTabId(): Promise<number> {
        if (this.destinationTabId !== null) return this.destinationTabId;

        const { spreadsheetId, sheetName } = this.destination;
        const tabs = await this.service.getTabs(spreadsheetId);
        const tab = tabs.find(t => t.title === sheetName);
        if (!tab) {
            throw new Error(`Sheet "${sheetName}" not found in target spreadsheet`);
        }
        this.destinationTabId = tab.tabId;
        return tab.tabId;
    }
}
