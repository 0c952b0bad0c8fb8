/**
 * Unit tests for Google Sheets error classification and credential handling
 */

import { GoogleSheetsService, extractStatusCode, isTransientError } from '../googleSheetsClient.js';
import { ConfigurationError } from '../../utils/errors.js';

describe('extractStatusCode', () => {
    it('reads a numeric code', () => {
        expect(extractStatusCode({ code: 429 })).toBe(429);
    });

    it('reads a numeric string code', () => {
        expect(extractStatusCode({ code: '503' })).toBe(503);
    });

    it('falls back to status when code is not numeric', () => {
        expect(extractStatusCode({ code: 'ECONNRESET', status: 500 })).toBe(500);
    });

    it('returns null for values without a status', () => {
        expect(extractStatusCode(new Error('plain'))).toBeNull();
        expect(extractStatusCode('boom')).toBeNull();
        expect(extractStatusCode(null)).toBeNull();
    });
});

describe('isTransientError', () => {
    it.each([429, 500, 503])('retries %i', (code) => {
        expect(isTransientError({ code })).toBe(true);
    });

    it.each([400, 403, 404])('does not retry %i', (code) => {
        expect(isTransientError({ code })).toBe(false);
    });

    it('does not retry errors without a status', () => {
        expect(isTransientError(new Error('socket hang up'))).toBe(false);
    });
});

describe('GoogleSheetsService credentials', () => {
    it('fails with ConfigurationError when no key is available', async () => {
        const service = new GoogleSheetsService({
            serviceAccountJson: null,
            serviceAccountPath: '/nonexistent/service-account.json',
        });

        await expect(service.getTabs('sheet-id')).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('fails with ConfigurationError when the inline key is not JSON', async () => {
        const service = new GoogleSheetsService({ serviceAccountJson: 'not json', serviceAccountPath: 'unused.json' });

        await expect(service.readRange('sheet-id', { tab: 'Sheet1', startRow: 1, startColumn: 0, endColumn: 0 }))
            .rejects.toThrow('Google service account key is not valid JSON');
    });

    it('fails with ConfigurationError when the key lacks a private key', async () => {
        const service = new GoogleSheetsService({
            serviceAccountJson: JSON.stringify({ client_email: 'bot@example.test' }),
            serviceAccountPath: 'unused.json',
        });

        await expect(service.getTabs('sheet-id')).rejects.toThrow(
            'Google service account key is missing client_email or private_key'
        );
    });
});
