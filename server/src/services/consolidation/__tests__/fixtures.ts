/**
 * Shared builders for consolidation tests
 */

import { buildConsolidationConfig, type ConsolidationConfig } from '../../../config/index.js';
import { parseEnv } from '../../../config/env.js';
import type { Row } from '../types.js';
import type { InMemorySpreadsheetService } from './inMemorySpreadsheetService.js';

export const MASTER_ID = 'master-sheet';
export const TARGET_ID = 'target-sheet';

export const MASTER_HEADER: Row = ['Company', 'Status', 'Appointment Spreadsheet:'];
export const SOURCE_HEADER: Row = ['Date', 'Time', 'Name', 'Phone'];

export function sourceUrl(spreadsheetId: string, gid = 0): string {
    return `https://docs.google.com/spreadsheets/d/${spreadsheetId}/edit#gid=${gid}`;
}

export function makeConfig(env: Record<string, string> = {}): ConsolidationConfig {
    return buildConsolidationConfig(
        parseEnv({
            TARGET_SPREADSHEET_ID: TARGET_ID,
            MASTER_SPREADSHEET_ID: MASTER_ID,
            SOURCE_PAUSE_MS: '0',
            ...env,
        })
    );
}

/** Master tab listing one row per [company, url] */
export function seedMaster(service: InMemorySpreadsheetService, entries: Array<[string, string]>): void {
    service.addSpreadsheet(MASTER_ID, [
        {
            title: 'Active Clients',
            rows: [MASTER_HEADER, ...entries.map(([company, url]) => [company, 'active', url])],
        },
    ]);
}

/** Source spreadsheet with a single tab "Appointments" (gid 0) */
export function seedSource(service: InMemorySpreadsheetService, spreadsheetId: string, dataRows: Row[]): void {
    service.addSpreadsheet(spreadsheetId, [{ tabId: 0, title: 'Appointments', rows: [SOURCE_HEADER, ...dataRows] }]);
}

export function seedTarget(service: InMemorySpreadsheetService, rows: Row[] = []): void {
    service.addSpreadsheet(TARGET_ID, [{ tabId: 0, title: 'Sheet1', rows }]);
}
