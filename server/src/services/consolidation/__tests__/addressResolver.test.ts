/**
 * Unit tests for spreadsheet URL parsing and tab resolution
 */

import { parseSheetAddress, resolveSource, resolveTabName } from '../addressResolver.js';
import { InMemorySpreadsheetService } from './inMemorySpreadsheetService.js';

describe('parseSheetAddress', () => {
    it('reads id and gid from a canonical link', () => {
        expect(parseSheetAddress('https://docs.google.com/spreadsheets/d/1AbC-d_9/edit#gid=123')).toEqual({
            spreadsheetId: '1AbC-d_9',
            tabId: 123,
        });
    });

    it('defaults the tab id to 0 when gid is absent', () => {
        expect(parseSheetAddress('https://docs.google.com/spreadsheets/d/1AbC/edit')).toEqual({
            spreadsheetId: '1AbC',
            tabId: 0,
        });
    });

    it('falls back to the id= query parameter', () => {
        expect(parseSheetAddress('https://docs.google.com/open?id=XyZ_1&gid=7')).toEqual({
            spreadsheetId: 'XyZ_1',
            tabId: 7,
        });
    });

    it('prefers the /spreadsheets/d/ id over an id= parameter', () => {
        expect(parseSheetAddress('https://docs.google.com/spreadsheets/d/first/edit?id=second')).toEqual({
            spreadsheetId: 'first',
            tabId: 0,
        });
    });

    it('returns null when no id can be found', () => {
        expect(parseSheetAddress('https://example.com/not-a-sheet')).toBeNull();
    });
});

describe('resolveTabName', () => {
    let service: InMemorySpreadsheetService;

    beforeEach(() => {
        service = new InMemorySpreadsheetService();
        service.addSpreadsheet('src', [
            { tabId: 0, title: 'Overview' },
            { tabId: 55, title: 'Bookings' },
        ]);
    });

    it('returns the title of the matching tab', async () => {
        expect(await resolveTabName(service, 'src', 55)).toBe('Bookings');
    });

    it('falls back to the first tab when the id is unknown', async () => {
        expect(await resolveTabName(service, 'src', 999)).toBe('Overview');
    });

    it('returns null when the spreadsheet has no tabs', async () => {
        service.addSpreadsheet('empty', []);
        expect(await resolveTabName(service, 'empty', 0)).toBeNull();
    });

    it('returns null when metadata cannot be read', async () => {
        service.fail('getTabs', { spreadsheetId: 'src' });
        expect(await resolveTabName(service, 'src', 55)).toBeNull();
    });
});

describe('resolveSource', () => {
    it('combines the seed, the parsed address and the tab title', async () => {
        const service = new InMemorySpreadsheetService();
        service.addSpreadsheet('src', [{ tabId: 55, title: 'Bookings' }]);

        const seed = { url: 'https://docs.google.com/spreadsheets/d/src/edit#gid=55', displayName: 'Acme' };
        expect(await resolveSource(service, seed)).toEqual({
            url: seed.url,
            displayName: 'Acme',
            spreadsheetId: 'src',
            tabId: 55,
            tabName: 'Bookings',
        });
    });

    it('keeps the URL gid as the tab id when falling back to the first tab', async () => {
        const service = new InMemorySpreadsheetService();
        service.addSpreadsheet('src', [{ tabId: 0, title: 'Overview' }]);

        const source = await resolveSource(service, {
            url: 'https://docs.google.com/spreadsheets/d/src/edit#gid=9',
            displayName: 'Acme',
        });
        expect(source?.tabId).toBe(9);
        expect(source?.tabName).toBe('Overview');
    });

    it('returns null for an unparseable URL without calling the service', async () => {
        const service = new InMemorySpreadsheetService();
        expect(await resolveSource(service, { url: 'https://example.com', displayName: 'Acme' })).toBeNull();
        expect(service.calls).toHaveLength(0);
    });

    it('returns null for an unknown spreadsheet', async () => {
        const service = new InMemorySpreadsheetService();
        const seed = { url: 'https://docs.google.com/spreadsheets/d/missing/edit', displayName: 'Acme' };
        expect(await resolveSource(service, seed)).toBeNull();
    });
});
