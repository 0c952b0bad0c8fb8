/**
 * Consolidation configuration
 *
 * The engine never reads the environment itself: it receives one frozen
 * ConsolidationConfig at construction, built here from validated env values.
 */

import type { Env } from './env.js';
import { loadEnv } from './env.js';
import {
    COMPANY_NAME_HEADER,
    MASTER_LAST_COLUMN_INDEX,
    NEW_TAB_COLUMN_COUNT,
    NEW_TAB_ROW_COUNT,
} from './sync/consolidation.js';

export interface MasterCatalogConfig {
    readonly spreadsheetId: string;
    readonly sheetName: string;
    readonly companyColumnName: string;
    readonly urlColumnName: string;
    /** 0-based, inclusive */
    readonly lastColumnIndex: number;
}

export interface DestinationConfig {
    readonly spreadsheetId: string;
    readonly sheetName: string;
    readonly companyNameHeader: string;
    readonly newTabRowCount: number;
    readonly newTabColumnCount: number;
}

export interface CredentialsConfig {
    readonly serviceAccountJson: string | null;
    readonly serviceAccountPath: string;
}

export interface ConsolidationConfig {
    readonly master: MasterCatalogConfig;
    readonly destination: DestinationConfig;
    readonly credentials: CredentialsConfig;
    /** Columns read from each source tab, starting at A */
    readonly sourceColumnCount: number;
    readonly batchSourceThreshold: number;
    readonly sourcePauseMs: number;
    readonly idleIntervalMs: number;
    readonly emptyCatalogRetryMs: number;
    readonly ledgerPath: string;
}

export function buildConsolidationConfig(env: Env): ConsolidationConfig {
    return Object.freeze({
        master: Object.freeze({
            spreadsheetId: env.MASTER_SPREADSHEET_ID,
            sheetName: env.MASTER_SHEET_NAME,
            companyColumnName: env.COMPANY_COLUMN_NAME,
            urlColumnName: env.URL_COLUMN_NAME,
            lastColumnIndex: MASTER_LAST_COLUMN_INDEX,
        }),
        destination: Object.freeze({
            spreadsheetId: env.TARGET_SPREADSHEET_ID,
            sheetName: env.TARGET_SHEET_NAME,
            companyNameHeader: COMPANY_NAME_HEADER,
            newTabRowCount: NEW_TAB_ROW_COUNT,
            newTabColumnCount: NEW_TAB_COLUMN_COUNT,
        }),
        credentials: Object.freeze({
            serviceAccountJson: env.GOOGLE_SERVICE_ACCOUNT_JSON ?? null,
            serviceAccountPath: env.GOOGLE_SERVICE_ACCOUNT_PATH,
        }),
        sourceColumnCount: env.SOURCE_COLUMN_COUNT,
        batchSourceThreshold: env.BATCH_SOURCE_THRESHOLD,
        sourcePauseMs: env.SOURCE_PAUSE_MS,
        idleIntervalMs: env.IDLE_INTERVAL_MS,
        emptyCatalogRetryMs: env.EMPTY_CATALOG_RETRY_MS,
        ledgerPath: env.LEDGER_PATH,
    });
}

/**
 * Read and validate the environment, then freeze it into a config.
 * @throws ConfigurationError when required settings are missing
 */
export function loadConsolidationConfig(): ConsolidationConfig {
    return buildConsolidationConfig(loadEnv());
}

export type { Env } from './env.js';
