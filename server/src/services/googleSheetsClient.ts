/**
 * Google Sheets API v4 Client (Authenticated)
 *
 * SpreadsheetService implementation backed by googleapis with a service
 * account JWT. Used for reading the master catalog and every source tab, and
 * for writing the destination.
 *
 * Features:
 * - Lazy auth: authenticates on first API call
 * - Rate limiter: minimum spacing between calls (300 calls/min quota)
 * - Retry: exponential backoff on 429/500/503
 */

import { google, type sheets_v4 } from 'googleapis';
import { readFileSync, existsSync } from 'fs';
import { z } from 'zod';
import type { CredentialsConfig } from '../config/index.js';
import {
    SHEETS_API_SCOPE,
    API_CALL_DELAY_MS,
    API_MAX_RETRIES,
} from '../config/sync/consolidation.js';
import { sheetsLogger } from '../utils/logger.js';
import { ConfigurationError, ExternalServiceError, toError } from '../utils/errors.js';
import { anchorToA1, toA1Notation, type CellAnchor, type CellRange } from '../utils/a1Notation.js';
import type {
    CreateTabOptions,
    Row,
    SpreadsheetService,
    TabMetadata,
} from './consolidation/types.js';

// ============================================
// TYPES
// ============================================

const serviceAccountKeySchema = z.object({
    client_email: z.string().min(1),
    private_key: z.string().min(1),
});

type ServiceAccountKey = z.infer<typeof serviceAccountKeySchema>;

const TRANSIENT_STATUS_CODES = new Set([429, 500, 503]);

// ============================================
// ERROR HELPERS
// ============================================

/**
 * HTTP status of a googleapis (Gaxios) error. `code` arrives as a string or
 * number depending on the failure; fall back to `status`.
 */
export function extractStatusCode(error: unknown): number | null {
    if (typeof error !== 'object' || error === null) return null;

    const candidates: unknown[] = [];
    if ('code' in error) candidates.push(error.code);
    if ('status' in error) candidates.push(error.status);

    for (const candidate of candidates) {
        const value = Number(candidate);
        if (Number.isInteger(value) && value > 0) return value;
    }
    return null;
}

export function isTransientError(error: unknown): boolean {
    const statusCode = extractStatusCode(error);
    return statusCode !== null && TRANSIENT_STATUS_CODES.has(statusCode);
}

// ============================================
// CLIENT
// ============================================

export class GoogleSheetsService implements SpreadsheetService {
    private readonly credentials: CredentialsConfig;
    private client: sheets_v4.Sheets | null = null;
    private lastCallAt = 0;

    constructor(credentials: CredentialsConfig) {
        this.credentials = credentials;
    }

    async readRange(spreadsheetId: string, range: CellRange): Promise<Row[]> {
        const client = this.getClient();
        const a1 = toA1Notation(range);

        const response = await this.withRetry(
            () => client.spreadsheets.values.get({
                spreadsheetId,
                range: a1,
                valueRenderOption: 'FORMATTED_VALUE',
            }),
            `readRange(${a1})`
        );

        // Google Sheets API returns mixed types; coerce everything to strings
        const raw = response.data.values ?? [];
        return raw.map(row => row.map(cell => String(cell ?? '')));
    }

    async getTabs(spreadsheetId: string): Promise<TabMetadata[]> {
        const client = this.getClient();

        const response = await this.withRetry(
            () => client.spreadsheets.get({
                spreadsheetId,
                includeGridData: false,
                fields: 'sheets.properties(sheetId,title)',
            }),
            `getTabs(${spreadsheetId})`
        );

        const tabs: TabMetadata[] = [];
        for (const sheet of response.data.sheets ?? []) {
            const tabId = sheet.properties?.sheetId;
            const title = sheet.properties?.title;
            if (typeof tabId === 'number' && typeof title === 'string') {
                tabs.push({ tabId, title });
            }
        }
        return tabs;
    }

    async writeRows(spreadsheetId: string, anchor: CellAnchor, rows: Row[]): Promise<void> {
        const client = this.getClient();
        const a1 = anchorToA1(anchor);

        await this.withRetry(
            () => client.spreadsheets.values.update({
                spreadsheetId,
                range: a1,
                valueInputOption: 'RAW',
                requestBody: { values: rows },
            }),
            `writeRows(${a1})`
        );
    }

    async insertRows(spreadsheetId: string, tabId: number, startIndex: number, count: number): Promise<void> {
        const client = this.getClient();

        await this.withRetry(
            () => client.spreadsheets.batchUpdate({
                spreadsheetId,
                requestBody: {
                    requests: [{
                        insertDimension: {
                            range: {
                                sheetId: tabId,
                                dimension: 'ROWS',
                                startIndex,
                                endIndex: startIndex + count,
                            },
                            inheritFromBefore: false,
                        },
                    }],
                },
            }),
            `insertRows(${startIndex}+${count})`
        );
    }

    async createTab(spreadsheetId: string, title: string, options: CreateTabOptions): Promise<TabMetadata> {
        const client = this.getClient();

        const response = await this.withRetry(
            () => client.spreadsheets.batchUpdate({
                spreadsheetId,
                requestBody: {
                    requests: [{
                        addSheet: {
                            properties: {
                                title,
                                gridProperties: {
                                    rowCount: options.rowCount,
                                    columnCount: options.columnCount,
                                },
                            },
                        },
                    }],
                },
            }),
            `createTab(${title})`
        );

        const tabId = response.data.replies?.[0]?.addSheet?.properties?.sheetId;
        if (typeof tabId !== 'number') {
            throw new ExternalServiceError(`createTab(${title}): response carried no sheet id`, 'google-sheets');
        }
        return { tabId, title };
    }

    // ============================================
    // AUTH
    // ============================================

    /**
     * Credential sources (checked in order):
     *   1. GOOGLE_SERVICE_ACCOUNT_JSON (JSON string)
     *   2. JSON key file at GOOGLE_SERVICE_ACCOUNT_PATH
     */
    private getClient(): sheets_v4.Sheets {
        if (this.client) return this.client;

        const keyFile = this.readServiceAccountKey();
        const auth = new google.auth.JWT({
            email: keyFile.client_email,
            key: keyFile.private_key,
            scopes: [SHEETS_API_SCOPE],
        });

        this.client = google.sheets({ version: 'v4', auth });
        sheetsLogger.info('Google Sheets API client initialized');
        return this.client;
    }

    private readServiceAccountKey(): ServiceAccountKey {
        const { serviceAccountJson, serviceAccountPath } = this.credentials;

        let raw: string;
        if (serviceAccountJson) {
            raw = serviceAccountJson;
            sheetsLogger.info('Using Google service account from GOOGLE_SERVICE_ACCOUNT_JSON env var');
        } else if (existsSync(serviceAccountPath)) {
            raw = readFileSync(serviceAccountPath, 'utf-8');
            sheetsLogger.info({ path: serviceAccountPath }, 'Using Google service account from key file');
        } else {
            throw new ConfigurationError(
                'Google service account credentials not found. ' +
                `Set GOOGLE_SERVICE_ACCOUNT_JSON or place a key file at ${serviceAccountPath}`
            );
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch {
            throw new ConfigurationError('Google service account key is not valid JSON');
        }

        const result = serviceAccountKeySchema.safeParse(parsed);
        if (!result.success) {
            throw new ConfigurationError('Google service account key is missing client_email or private_key');
        }
        return result.data;
    }

    // ============================================
    // RATE LIMIT & RETRY
    // ============================================

    /**
     * Wait if needed to respect rate limit (min API_CALL_DELAY_MS between calls)
     */
    private async rateLimit(): Promise<void> {
        const elapsed = Date.now() - this.lastCallAt;
        if (elapsed < API_CALL_DELAY_MS) {
            await new Promise(resolve => setTimeout(resolve, API_CALL_DELAY_MS - elapsed));
        }
        this.lastCallAt = Date.now();
    }

    /**
     * Retry on transient errors (429, 500, 503) with exponential backoff
     */
    private async withRetry<T>(operation: () => Promise<T>, label: string): Promise<T> {
        for (let attempt = 0; ; attempt++) {
            try {
                await this.rateLimit();
                return await operation();
            } catch (error: unknown) {
                const statusCode = extractStatusCode(error);

                if (!isTransientError(error) || attempt >= API_MAX_RETRIES) {
                    const cause = toError(error);
                    throw new ExternalServiceError(`${label}: ${cause.message}`, 'google-sheets', cause, statusCode);
                }

                const delay = Math.pow(2, attempt) * 1000; // 1s, 2s, 4s
                sheetsLogger.warn(
                    { attempt: attempt + 1, delay, statusCode, label },
                    'Retrying after transient error'
                );
                await new Promise(resolve => setTimeout(resolve, delay));
            }
        }
    }
}
