/**
 * Custom error classes for the consolidation engine
 * Use these instead of generic Error for specific failure kinds
 */

/**
 * Base interface for custom errors with a stable machine-readable code
 */
export interface CustomError extends Error {
    readonly code: string;
}

/**
 * Configuration error - thrown when required settings are missing or invalid.
 * The only fatal error kind: the process stops before the poll loop starts.
 *
 * @example
 * throw new ConfigurationError('TARGET_SPREADSHEET_ID is required', ['TARGET_SPREADSHEET_ID: Required']);
 */
export class ConfigurationError extends Error implements CustomError {
    readonly name = 'ConfigurationError' as const;
    readonly code = 'CONFIGURATION' as const;
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(message);
        this.issues = issues;
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }
}

/**
 * External service error - thrown when a spreadsheet API call fails
 * after retries are exhausted
 *
 * @example
 * throw new ExternalServiceError('readRange failed', 'google-sheets', originalError);
 */
export class ExternalServiceError extends Error implements CustomError {
    readonly name = 'ExternalServiceError' as const;
    readonly code = 'EXTERNAL_SERVICE' as const;
    readonly serviceName: string | null;
    readonly originalError: Error | null;
    readonly statusCode: number | null;

    constructor(
        message: string,
        serviceName: string | null = null,
        originalError: Error | null = null,
        statusCode: number | null = null
    ) {
        super(message);
        this.serviceName = serviceName;
        this.originalError = originalError;
        this.statusCode = statusCode;
        Object.setPrototypeOf(this, ExternalServiceError.prototype);
    }
}

/**
 * Catalog schema error - a required column header is absent from the master sheet
 */
export class CatalogSchemaError extends Error implements CustomError {
    readonly name = 'CatalogSchemaError' as const;
    readonly code = 'CATALOG_SCHEMA' as const;
    readonly missingColumn: string;

    constructor(missingColumn: string, sheetName: string) {
        super(`Could not find column '${missingColumn}' in master sheet '${sheetName}'`);
        this.missingColumn = missingColumn;
        Object.setPrototypeOf(this, CatalogSchemaError.prototype);
    }
}

/**
 * Ledger persist error - the fingerprint ledger could not be saved
 */
export class LedgerPersistError extends Error implements CustomError {
    readonly name = 'LedgerPersistError' as const;
    readonly code = 'LEDGER_PERSIST' as const;
    readonly filePath: string | null;

    constructor(message: string, filePath: string | null = null) {
        super(message);
        this.filePath = filePath;
        Object.setPrototypeOf(this, LedgerPersistError.prototype);
    }
}

/**
 * Normalize any thrown value into a log-friendly message
 */
export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Normalize any thrown value into an Error instance
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
