/**
 * Row fingerprints and source identity keys.
 */

import { createHash } from 'crypto';
import type { Row, SheetAddress } from './types.js';

/**
 * SHA-256 (hex) of the row's cells concatenated in order, no separator.
 * Matches fingerprints already stored in existing ledger files.
 */
export function fingerprintRow(row: Row): string {
    return createHash('sha256').update(row.join(''), 'utf8').digest('hex');
}

/**
 * Ledger key of a source: "<spreadsheetId>_<tabId>"
 */
export function sourceKeyOf(address: SheetAddress): string {
    return `${address.spreadsheetId}_${address.tabId}`;
}
