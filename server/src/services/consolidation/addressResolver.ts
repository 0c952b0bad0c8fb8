/**
 * Address Resolver
 *
 * Turns a spreadsheet URL into (spreadsheetId, tabId), then into a tab title
 * via spreadsheet metadata. Failures return null so the caller can skip the
 * source without aborting the cycle.
 */

import { consolidationLogger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import type { SheetAddress, SourceDescriptor, SourceSeed, SpreadsheetService } from './types.js';

/** Tried in order; first match wins */
const SPREADSHEET_ID_PATTERNS: readonly RegExp[] = [
    /\/spreadsheets\/d\/([a-zA-Z0-9_-]+)/, // canonical link
    /id=([a-zA-Z0-9_-]+)/, // legacy ?id= link
];

const GID_PATTERN = /gid=(\d+)/;

export function parseSheetAddress(url: string): SheetAddress | null {
    let spreadsheetId: string | null = null;
    for (const pattern of SPREADSHEET_ID_PATTERNS) {
        const match = url.match(pattern);
        if (match) {
            spreadsheetId = match[1];
            break;
        }
    }
    if (!spreadsheetId) return null;

    const gidMatch = url.match(GID_PATTERN);
    const tabId = gidMatch ? parseInt(gidMatch[1], 10) : 0;

    return { spreadsheetId, tabId };
}

/**
 * Title of the tab with the given id, falling back to the first tab.
 * @returns null when metadata cannot be read or the spreadsheet has no tabs
 */
export async function resolveTabName(
    service: SpreadsheetService,
    spreadsheetId: string,
    tabId: number
): Promise<string | null> {
    try {
        const tabs = await service.getTabs(spreadsheetId);
        const match = tabs.find(t => t.tabId === tabId);
        if (match) return match.title;

        if (tabs.length === 0) {
            consolidationLogger.warn({ spreadsheetId }, 'Spreadsheet has no tabs');
            return null;
        }

        consolidationLogger.debug(
            { spreadsheetId, tabId, fallback: tabs[0].title },
            'Tab id not found, falling back to first tab'
        );
        return tabs[0].title;
    } catch (error: unknown) {
        consolidationLogger.error(
            { spreadsheetId, error: getErrorMessage(error) },
            'Failed to get spreadsheet metadata'
        );
        return null;
    }
}

export async function resolveSource(
    service: SpreadsheetService,
    seed: SourceSeed
): Promise<SourceDescriptor | null> {
    const address = parseSheetAddress(seed.url);
    if (!address) {
        consolidationLogger.warn({ url: seed.url, company: seed.displayName }, "Couldn't parse spreadsheet ID, skipping");
        return null;
    }

    const tabName = await resolveTabName(service, address.spreadsheetId, address.tabId);
    if (tabName === null) {
        consolidationLogger.warn(
            { spreadsheetId: address.spreadsheetId, tabId: address.tabId, company: seed.displayName },
            "Couldn't resolve tab name, skipping"
        );
        return null;
    }

    return { ...seed, ...address, tabName };
}
