/**
 * Source Catalog
 *
 * Reads the master tab, finds the company and URL columns by header text,
 * and returns the ordered, URL-deduplicated list of sources.
 * Fails closed: a missing column or unreadable master yields an empty list.
 */

import type { ConsolidationConfig } from '../../config/index.js';
import { catalogLogger } from '../../utils/logger.js';
import { CatalogSchemaError, getErrorMessage } from '../../utils/errors.js';
import { columnLetter } from '../../utils/a1Notation.js';
import type { CatalogColumns, Row, SourceSeed, SpreadsheetService } from './types.js';

export interface CatalogColumnNames {
    company: string;
    url: string;
}

const EMBEDDED_URL_PATTERN = /(https?:\/\/\S+)/;

/**
 * Locate the catalog columns by exact (trimmed) header text.
 * If a name appears more than once the last occurrence wins.
 * @throws CatalogSchemaError when either column is missing
 */
export function resolveCatalogColumns(
    header: Row,
    names: CatalogColumnNames,
    sheetName: string
): CatalogColumns {
    let company = -1;
    let url = -1;

    header.forEach((cell, i) => {
        const text = cell.trim();
        if (text === names.company) company = i;
        if (text === names.url) url = i;
    });

    if (company === -1) throw new CatalogSchemaError(names.company, sheetName);
    if (url === -1) throw new CatalogSchemaError(names.url, sheetName);

    return { company, url };
}

/**
 * The cell is the URL itself, or free text with a URL somewhere inside.
 */
export function extractSourceUrl(cell: string): string | null {
    if (cell.includes('http') && cell.includes('spreadsheets')) {
        return cell.trim();
    }
    const match = cell.match(EMBEDDED_URL_PATTERN);
    return match ? match[1] : null;
}

export function buildSourceCatalog(rows: Row[], columns: CatalogColumns): SourceSeed[] {
    const required = Math.max(columns.company, columns.url);
    const seen = new Set<string>();
    const seeds: SourceSeed[] = [];

    for (const row of rows) {
        if (row.length === 0 || row.length <= required) continue;

        const displayName = row[columns.company].trim();
        const urlCell = row[columns.url];
        if (!displayName || !urlCell) continue;

        const url = extractSourceUrl(urlCell);
        if (!url || seen.has(url)) continue;

        seen.add(url);
        seeds.push({ url, displayName });
    }

    return seeds;
}

export async function loadSourceCatalog(
    service: SpreadsheetService,
    config: ConsolidationConfig
): Promise<SourceSeed[]> {
    const { spreadsheetId, sheetName, companyColumnName, urlColumnName, lastColumnIndex } = config.master;

    try {
        const headerRows = await service.readRange(spreadsheetId, {
            tab: sheetName,
            startRow: 1,
            endRow: 1,
            startColumn: 0,
            endColumn: lastColumnIndex,
        });

        const columns = resolveCatalogColumns(
            headerRows[0] ?? [],
            { company: companyColumnName, url: urlColumnName },
            sheetName
        );
        catalogLogger.info(
            {
                companyColumn: columnLetter(columns.company),
                urlColumn: columnLetter(columns.url),
            },
            'Located catalog columns'
        );

        const dataRows = await service.readRange(spreadsheetId, {
            tab: sheetName,
            startRow: 2,
            startColumn: 0,
            endColumn: lastColumnIndex,
        });

        const seeds = buildSourceCatalog(dataRows, columns);
        catalogLogger.info({ sources: seeds.length }, 'Loaded appointment sheet sources from master spreadsheet');
        return seeds;
    } catch (error: unknown) {
        catalogLogger.error(
            { spreadsheetId, sheetName, error: getErrorMessage(error) },
            error instanceof CatalogSchemaError ? 'Master sheet is missing a required column' : 'Error reading master spreadsheet'
        );
        return [];
    }
}
