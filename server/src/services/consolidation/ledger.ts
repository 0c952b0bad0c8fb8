/**
 * Fingerprint Ledger
 *
 * Per-source record of row fingerprints already delivered to the destination.
 * The ledger file is the only durable state of the consolidator.
 *
 * `commit` is the only mutation; the batch writer calls it strictly after a
 * successful destination write and then persists through a LedgerStore.
 */

import { existsSync } from 'fs';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { ledgerLogger } from '../../utils/logger.js';
import { LedgerPersistError, getErrorMessage } from '../../utils/errors.js';

// ============================================
// TYPES
// ============================================

/** Serialized form: "<spreadsheetId>_<tabId>" → fingerprints in delivery order */
export type LedgerSnapshot = Record<string, string[]>;

const ledgerSnapshotSchema = z.record(z.string(), z.array(z.string()));

export interface LedgerStore {
    /** Never throws for missing or corrupt data; returns an empty snapshot instead */
    load(): Promise<LedgerSnapshot>;
    save(snapshot: LedgerSnapshot): Promise<void>;
}

// ============================================
// LEDGER
// ============================================

export class FingerprintLedger {
    private readonly entries: Map<string, { order: string[]; members: Set<string> }> = new Map();

    static fromSnapshot(snapshot: LedgerSnapshot): FingerprintLedger {
        const ledger = new FingerprintLedger();
        for (const [sourceKey, fingerprints] of Object.entries(snapshot)) {
            ledger.commit(sourceKey, fingerprints);
        }
        return ledger;
    }

    contains(sourceKey: string, fingerprint: string): boolean {
        return this.entries.get(sourceKey)?.members.has(fingerprint) ?? false;
    }

    /**
     * Record fingerprints as delivered. Creates the source entry on first use;
     * fingerprints already present are ignored.
     */
    commit(sourceKey: string, fingerprints: Iterable<string>): void {
        let entry = this.entries.get(sourceKey);
        if (!entry) {
            entry = { order: [], members: new Set() };
            this.entries.set(sourceKey, entry);
        }
        for (const fp of fingerprints) {
            if (entry.members.has(fp)) continue;
            entry.members.add(fp);
            entry.order.push(fp);
        }
    }

    sourceKeys(): string[] {
        return Array.from(this.entries.keys());
    }

    count(sourceKey: string): number {
        return this.entries.get(sourceKey)?.order.length ?? 0;
    }

    totalCount(): number {
        let total = 0;
        for (const entry of this.entries.values()) total += entry.order.length;
        return total;
    }

    toSnapshot(): LedgerSnapshot {
        const snapshot: LedgerSnapshot = {};
        for (const [sourceKey, entry] of this.entries) {
            snapshot[sourceKey] = [...entry.order];
        }
        return snapshot;
    }
}

// ============================================
// STORES
// ============================================

/**
 * JSON file store. Saves go to a sibling temp file that is renamed over the
 * target, so a crash mid-save leaves the previous ledger intact.
 */
export class FileLedgerStore implements LedgerStore {
    private readonly filePath: string;

    constructor(filePath: string) {
        this.filePath = filePath;
    }

    async load(): Promise<LedgerSnapshot> {
        if (!existsSync(this.filePath)) {
            ledgerLogger.debug({ filePath: this.filePath }, 'No ledger file yet, starting empty');
            return {};
        }

        let raw: string;
        try {
            raw = await readFile(this.filePath, 'utf-8');
        } catch (error: unknown) {
            ledgerLogger.warn({ filePath: this.filePath, error: getErrorMessage(error) }, 'Ledger file unreadable, starting empty');
            return {};
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch {
            ledgerLogger.warn({ filePath: this.filePath }, 'Ledger file is empty or corrupt, starting empty');
            return {};
        }

        const result = ledgerSnapshotSchema.safeParse(parsed);
        if (!result.success) {
            ledgerLogger.warn(
                { filePath: this.filePath, issues: result.error.issues.length },
                'Ledger file has unexpected shape, starting empty'
            );
            return {};
        }
        return result.data;
    }

    async save(snapshot: LedgerSnapshot): Promise<void> {
        const tempPath = `${this.filePath}.tmp`;
        try {
            await mkdir(dirname(this.filePath), { recursive: true });
            await writeFile(tempPath, JSON.stringify(snapshot, null, 2), 'utf-8');
            await rename(tempPath, this.filePath);
        } catch (error: unknown) {
            throw new LedgerPersistError(`Failed to save ledger: ${getErrorMessage(error)}`, this.filePath);
        }
    }

    getFilePath(): string {
        return this.filePath;
    }
}
