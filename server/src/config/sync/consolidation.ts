/**
 * Consolidation Defaults
 *
 * Column names, batch sizes, timing, and API pacing for the appointment
 * consolidation worker. Every value here can be overridden through the
 * environment (see config/env.ts); these are the fallbacks.
 */

// ============================================
// MASTER CATALOG
// ============================================

/** Tab of the master spreadsheet that lists every client */
export const DEFAULT_MASTER_SHEET_NAME = 'Active Clients';

/** Header text of the company column in the master tab */
export const DEFAULT_COMPANY_COLUMN_NAME = 'Company';

/** Header text of the column holding each client's appointment sheet URL */
export const DEFAULT_URL_COLUMN_NAME = 'Appointment Spreadsheet:';

/**
 * Last column read from the master tab (0-based, inclusive): ZZ.
 * Catalog columns are located by header text, not position.
 */
export const MASTER_LAST_COLUMN_INDEX = 701;

// ============================================
// DESTINATION
// ============================================

export const DEFAULT_TARGET_SHEET_NAME = 'Sheet1';

/** Header appended after the source columns in the destination */
export const COMPANY_NAME_HEADER = 'Company Name';

/** Grid size of a destination tab created from scratch (A–Z) */
export const NEW_TAB_ROW_COUNT = 1000;
export const NEW_TAB_COLUMN_COUNT = 26;

// ============================================
// SOURCES
// ============================================

/**
 * Columns read from each source tab: A through Q.
 * Wider reads pick up formatting-only cells that change fingerprints.
 */
export const DEFAULT_SOURCE_COLUMN_COUNT = 17;

// ============================================
// BATCHING & TIMING
// ============================================

/** Sources per flush window */
export const DEFAULT_BATCH_SOURCE_THRESHOLD = 25;

/** Pause after each source whose rows were read (ms) */
export const DEFAULT_SOURCE_PAUSE_MS = 3000;

/** Idle time between full passes (ms), 4 hours */
export const DEFAULT_IDLE_INTERVAL_MS = 4 * 60 * 60 * 1000;

/** Idle time when the master catalog produced no sources (ms) */
export const DEFAULT_EMPTY_CATALOG_RETRY_MS = 4 * 60 * 60 * 1000;

/** Number of cycle results kept in scheduler status */
export const RECENT_RUNS_LIMIT = 10;

// ============================================
// PERSISTENCE
// ============================================

/** Fingerprint ledger file, relative to the working directory */
export const DEFAULT_LEDGER_PATH = 'processed_rows.json';

// ============================================
// GOOGLE SHEETS API
// ============================================

export const SHEETS_API_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

/** Service account key file, relative to the working directory */
export const DEFAULT_SERVICE_ACCOUNT_PATH = 'service-account.json';

/**
 * Delay between Google Sheets API calls (ms). Quota is 300 calls/min.
 * 250ms = max 240 calls/min.
 */
export const API_CALL_DELAY_MS = 250;

/**
 * Max retries for transient API errors (429, 500, 503)
 */
export const API_MAX_RETRIES = 3;
