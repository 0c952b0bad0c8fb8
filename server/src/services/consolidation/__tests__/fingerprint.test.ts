/**
 * Unit tests for row fingerprints and source keys
 */

import { fingerprintRow, sourceKeyOf } from '../fingerprint.js';

describe('fingerprintRow', () => {
    it('hashes the concatenated cells with SHA-256', () => {
        expect(fingerprintRow(['a', 'b', 'c'])).toBe(
            'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
        );
    });

    it('hashes an empty row as the empty string', () => {
        expect(fingerprintRow([])).toBe(
            'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
        );
    });

    it('is deterministic', () => {
        const row = ['2024-03-01', '10:00', 'Dana', '555-0100'];
        expect(fingerprintRow(row)).toBe(fingerprintRow([...row]));
    });

    it('distinguishes rows with different cell values', () => {
        expect(fingerprintRow(['a', 'b'])).not.toBe(fingerprintRow(['a', 'c']));
    });

    it('treats rows whose cells concatenate identically as the same row', () => {
        expect(fingerprintRow(['ab', 'c'])).toBe(fingerprintRow(['a', 'bc']));
    });
});

describe('sourceKeyOf', () => {
    it('joins spreadsheet id and tab id with an underscore', () => {
        expect(sourceKeyOf({ spreadsheetId: 'abc123', tabId: 42 })).toBe('abc123_42');
    });

    it('keeps tab id 0', () => {
        expect(sourceKeyOf({ spreadsheetId: 'abc123', tabId: 0 })).toBe('abc123_0');
    });
});
