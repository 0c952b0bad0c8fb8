/**
 * Shared types for the consolidation engine.
 */

import type { CellAnchor, CellRange } from '../../utils/a1Notation.js';

// ============================================
// SPREADSHEET CAPABILITY
// ============================================

/** Ordered cell text values of one row */
export type Row = string[];

export interface TabMetadata {
    tabId: number;
    title: string;
}

export interface CreateTabOptions {
    rowCount: number;
    columnCount: number;
}

/**
 * Everything the engine needs from a spreadsheet backend.
 * Implemented by GoogleSheetsService and by the in-memory fake used in tests.
 * Every call may throw; the engine decides what a failure means.
 */
export interface SpreadsheetService {
    /** Values in the range; trailing empty rows and cells are omitted */
    readRange(spreadsheetId: string, range: CellRange): Promise<Row[]>;
    /** Tabs in spreadsheet order */
    getTabs(spreadsheetId: string): Promise<TabMetadata[]>;
    /** Overwrite cells starting at the anchor, values taken as typed */
    writeRows(spreadsheetId: string, anchor: CellAnchor, rows: Row[]): Promise<void>;
    /** Insert `count` blank rows before the 0-based row index */
    insertRows(spreadsheetId: string, tabId: number, startIndex: number, count: number): Promise<void>;
    createTab(spreadsheetId: string, title: string, options: CreateTabOptions): Promise<TabMetadata>;
}

// ============================================
// SOURCES
// ============================================

/** Catalog entry before its address is resolved */
export interface SourceSeed {
    url: string;
    displayName: string;
}

export interface SheetAddress {
    spreadsheetId: string;
    tabId: number;
}

export interface SourceDescriptor extends SourceSeed, SheetAddress {
    tabName: string;
}

/** Column positions of the master catalog, found by header text */
export interface CatalogColumns {
    company: number;
    url: number;
}

// ============================================
// RESULTS
// ============================================

export type SourceOutcome =
    | 'unresolved'
    | 'read_failed'
    | 'empty'
    | 'no_new_rows'
    | 'new_rows';

export interface SourceReport {
    ordinal: number;
    displayName: string;
    sourceKey: string | null;
    outcome: SourceOutcome;
    newRows: number;
}

export type FlushStatus = 'written' | 'write_failed' | 'persist_failed';

export interface FlushResult {
    /** Source ordinal after which the flush ran */
    afterSource: number;
    status: FlushStatus;
    rows: number;
    /** Whether the batch was inserted above existing rows */
    prepended: boolean;
    error: string | null;
}

export interface CycleResult {
    startedAt: string;
    dryRun: boolean;
    sourcesFound: number;
    sourcesWithNewRows: number;
    sourcesSkipped: number;
    newRows: number;
    rowsWritten: number;
    flushes: FlushResult[];
    sources: SourceReport[];
    durationMs: number;
    error: string | null;
}
