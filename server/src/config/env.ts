/**
 * Environment Variable Validation
 *
 * Validates every setting the consolidator reads from the environment using Zod.
 * Configuration is read once at startup and never re-read while the loop runs.
 *
 * USAGE:
 * - `loadEnv()` loads .env (dotenv) and validates process.env
 * - `parseEnv(source)` validates an explicit record (tests, tooling)
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add JSDoc comment explaining the variable
 * 3. Map it into ConsolidationConfig in config/index.ts
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import {
    DEFAULT_MASTER_SHEET_NAME,
    DEFAULT_COMPANY_COLUMN_NAME,
    DEFAULT_URL_COLUMN_NAME,
    DEFAULT_TARGET_SHEET_NAME,
    DEFAULT_LEDGER_PATH,
    DEFAULT_BATCH_SOURCE_THRESHOLD,
    DEFAULT_SOURCE_PAUSE_MS,
    DEFAULT_IDLE_INTERVAL_MS,
    DEFAULT_EMPTY_CATALOG_RETRY_MS,
    DEFAULT_SERVICE_ACCOUNT_PATH,
    DEFAULT_SOURCE_COLUMN_COUNT,
} from './sync/consolidation.js';

// ============================================
// SCHEMA DEFINITION
// ============================================

const requiredId = (name: string) =>
    z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

export const envSchema = z.object({
    // ----------------------------------------
    // REQUIRED - The loop will not start without these
    // ----------------------------------------

    /** Destination spreadsheet that receives consolidated rows */
    TARGET_SPREADSHEET_ID: requiredId('TARGET_SPREADSHEET_ID'),

    /** Master spreadsheet listing every client and its appointment sheet URL */
    MASTER_SPREADSHEET_ID: requiredId('MASTER_SPREADSHEET_ID'),

    // ----------------------------------------
    // OPTIONAL - With sensible defaults
    // ----------------------------------------

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Destination tab name (created when missing) */
    TARGET_SHEET_NAME: z.string().trim().min(1).default(DEFAULT_TARGET_SHEET_NAME),

    /** Master tab name */
    MASTER_SHEET_NAME: z.string().trim().min(1).default(DEFAULT_MASTER_SHEET_NAME),

    /** Header text of the company column in the master tab */
    COMPANY_COLUMN_NAME: z.string().trim().min(1).default(DEFAULT_COMPANY_COLUMN_NAME),

    /** Header text of the source URL column in the master tab */
    URL_COLUMN_NAME: z.string().trim().min(1).default(DEFAULT_URL_COLUMN_NAME),

    /** Fingerprint ledger JSON file */
    LEDGER_PATH: z.string().trim().min(1).default(DEFAULT_LEDGER_PATH),

    // ----------------------------------------
    // BATCHING & TIMING
    // ----------------------------------------

    /** Sources per flush window */
    BATCH_SOURCE_THRESHOLD: z.coerce.number().int().positive().default(DEFAULT_BATCH_SOURCE_THRESHOLD),

    /** Columns read from each source tab (A..) */
    SOURCE_COLUMN_COUNT: z.coerce.number().int().positive().max(702).default(DEFAULT_SOURCE_COLUMN_COUNT),

    /** Pause after each source whose rows were read (ms) */
    SOURCE_PAUSE_MS: z.coerce.number().int().nonnegative().default(DEFAULT_SOURCE_PAUSE_MS),

    /** Idle time between full passes (ms) */
    IDLE_INTERVAL_MS: z.coerce.number().int().positive().default(DEFAULT_IDLE_INTERVAL_MS),

    /** Idle time after an empty catalog (ms) */
    EMPTY_CATALOG_RETRY_MS: z.coerce.number().int().positive().default(DEFAULT_EMPTY_CATALOG_RETRY_MS),

    // ----------------------------------------
    // GOOGLE CREDENTIALS
    // ----------------------------------------

    /** Inline service account key (JSON string, for CI and containers) */
    GOOGLE_SERVICE_ACCOUNT_JSON: z.string().optional(),

    /** Service account key file (local runs) */
    GOOGLE_SERVICE_ACCOUNT_PATH: z.string().trim().min(1).default(DEFAULT_SERVICE_ACCOUNT_PATH),

    // ----------------------------------------
    // LOGGING
    // ----------------------------------------

    /** Pino log level */
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * Validate an environment record.
 * @throws ConfigurationError listing every failing variable
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
    const result = envSchema.safeParse(source);
    if (result.success) {
        return result.data;
    }

    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(
        `Environment validation failed:\n${issues.map(i => `  - ${i}`).join('\n')}`,
        issues
    );
}

/**
 * Load .env into process.env (existing variables win) and validate it.
 */
export function loadEnv(): Env {
    dotenv.config();
    return parseEnv(process.env);
}
