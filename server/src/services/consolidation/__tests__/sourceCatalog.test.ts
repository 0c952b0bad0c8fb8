/**
 * Unit tests for master catalog parsing
 */

import { CatalogSchemaError } from '../../../utils/errors.js';
import {
    buildSourceCatalog,
    extractSourceUrl,
    loadSourceCatalog,
    resolveCatalogColumns,
} from '../sourceCatalog.js';
import { InMemorySpreadsheetService } from './inMemorySpreadsheetService.js';
import { MASTER_ID, makeConfig, seedMaster, sourceUrl } from './fixtures.js';

const NAMES = { company: 'Company', url: 'Appointment Spreadsheet:' };

describe('resolveCatalogColumns', () => {
    it('finds both columns by header text', () => {
        expect(resolveCatalogColumns(['Id', 'Company', 'Appointment Spreadsheet:'], NAMES, 'Active Clients')).toEqual({
            company: 1,
            url: 2,
        });
    });

    it('ignores surrounding whitespace in header cells', () => {
        expect(resolveCatalogColumns([' Company ', 'Appointment Spreadsheet:  '], NAMES, 'Active Clients')).toEqual({
            company: 0,
            url: 1,
        });
    });

    it('uses the last occurrence of a repeated header', () => {
        const header = ['Company', 'Appointment Spreadsheet:', 'Company'];
        expect(resolveCatalogColumns(header, NAMES, 'Active Clients')).toEqual({ company: 2, url: 1 });
    });

    it('throws CatalogSchemaError naming the missing column', () => {
        expect(() => resolveCatalogColumns(['Appointment Spreadsheet:'], NAMES, 'Active Clients')).toThrow(
            CatalogSchemaError
        );
        expect(() => resolveCatalogColumns(['Company'], NAMES, 'Active Clients')).toThrow(
            "Could not find column 'Appointment Spreadsheet:' in master sheet 'Active Clients'"
        );
    });
});

describe('extractSourceUrl', () => {
    it('returns a trimmed spreadsheet URL as-is', () => {
        expect(extractSourceUrl('  https://docs.google.com/spreadsheets/d/abc/edit  ')).toBe(
            'https://docs.google.com/spreadsheets/d/abc/edit'
        );
    });

    it('extracts a URL embedded in free text', () => {
        expect(extractSourceUrl('see https://example.com/sheet?id=abc for details')).toBe(
            'https://example.com/sheet?id=abc'
        );
    });

    it('returns null when the cell holds no URL', () => {
        expect(extractSourceUrl('pending setup')).toBeNull();
    });
});

describe('buildSourceCatalog', () => {
    const columns = { company: 0, url: 2 };

    it('keeps catalog order and skips rows that are short or blank', () => {
        const rows = [
            ['Acme', 'x', sourceUrl('a')],
            [],
            ['Short', 'x'],
            ['', 'x', sourceUrl('b')],
            ['NoUrl', 'x', ''],
            ['Globex', 'x', sourceUrl('c')],
        ];
        expect(buildSourceCatalog(rows, columns)).toEqual([
            { url: sourceUrl('a'), displayName: 'Acme' },
            { url: sourceUrl('c'), displayName: 'Globex' },
        ]);
    });

    it('keeps only the first row for a repeated URL', () => {
        const rows = [
            ['Acme', 'x', sourceUrl('a')],
            ['Acme Duplicate', 'x', sourceUrl('a')],
        ];
        expect(buildSourceCatalog(rows, columns)).toEqual([{ url: sourceUrl('a'), displayName: 'Acme' }]);
    });

    it('trims the company name', () => {
        expect(buildSourceCatalog([['  Acme  ', 'x', sourceUrl('a')]], columns)).toEqual([
            { url: sourceUrl('a'), displayName: 'Acme' },
        ]);
    });
});

describe('loadSourceCatalog', () => {
    it('reads header and data rows from the master tab', async () => {
        const service = new InMemorySpreadsheetService();
        seedMaster(service, [
            ['Acme', sourceUrl('a')],
            ['Globex', sourceUrl('b', 3)],
        ]);

        expect(await loadSourceCatalog(service, makeConfig())).toEqual([
            { url: sourceUrl('a'), displayName: 'Acme' },
            { url: sourceUrl('b', 3), displayName: 'Globex' },
        ]);
    });

    it('returns an empty list when a required column is missing', async () => {
        const service = new InMemorySpreadsheetService();
        service.addSpreadsheet(MASTER_ID, [
            { title: 'Active Clients', rows: [['Client', 'Appointment Spreadsheet:'], ['Acme', sourceUrl('a')]] },
        ]);

        expect(await loadSourceCatalog(service, makeConfig())).toEqual([]);
    });

    it('returns an empty list when the master cannot be read', async () => {
        const service = new InMemorySpreadsheetService();
        seedMaster(service, [['Acme', sourceUrl('a')]]);
        service.fail('readRange', { spreadsheetId: MASTER_ID });

        expect(await loadSourceCatalog(service, makeConfig())).toEqual([]);
    });

    it('honours configured column names', async () => {
        const service = new InMemorySpreadsheetService();
        service.addSpreadsheet(MASTER_ID, [
            { title: 'Clients', rows: [['Client', 'Link'], ['Acme', sourceUrl('a')]] },
        ]);
        const config = makeConfig({ MASTER_SHEET_NAME: 'Clients', COMPANY_COLUMN_NAME: 'Client', URL_COLUMN_NAME: 'Link' });

        expect(await loadSourceCatalog(service, config)).toEqual([{ url: sourceUrl('a'), displayName: 'Acme' }]);
    });
});
