/**
 * Consolidation engine barrel file
 */

export { ConsolidationEngine } from './consolidationEngine.js';
export type { ConsolidationEngineOptions, CycleRunner, RunCycleOptions, Sleep } from './consolidationEngine.js';
export { PollScheduler } from './pollScheduler.js';
export type { SchedulerState, SchedulerStatus, SchedulerTiming } from './pollScheduler.js';
export { BatchWriter, PendingBatch, padRow } from './batchWriter.js';
export { FingerprintLedger, FileLedgerStore } from './ledger.js';
export type { LedgerSnapshot, LedgerStore } from './ledger.js';
export { fingerprintRow, sourceKeyOf } from './fingerprint.js';
export { parseSheetAddress, resolveTabName, resolveSource } from './addressResolver.js';
export {
    buildSourceCatalog,
    extractSourceUrl,
    loadSourceCatalog,
    resolveCatalogColumns,
} from './sourceCatalog.js';
export type { CatalogColumnNames } from './sourceCatalog.js';

export type {
    CatalogColumns,
    CreateTabOptions,
    CycleResult,
    FlushResult,
    FlushStatus,
    Row,
    SheetAddress,
    SourceDescriptor,
    SourceOutcome,
    SourceReport,
    SourceSeed,
    SpreadsheetService,
    TabMetadata,
} from './types.js';
