import { describe, test, expect } from '@jest/globals';
import { DateParserService } from '@/services/scan/date-parser.service';

describe('DateParserService', () => {
    const parser = new DateParserService();
    const iso = (raw: string): string | undefined => parser.parse(raw)?.toISOString();

    test('the suite runs with a host zone other than UTC', () => {
        expect(new Date(Date.UTC(2025, 0, 1)).getTimezoneOffset()).not.toBe(0);
    });

    test('reads numeric offsets', () => {
        expect(iso('Wed, 01 Jan 2025 10:00:00 +0000')).toBe('2025-01-01T10:00:00.000Z');
        expect(iso('1 Jan 2025 10:00:00 -0500')).toBe('2025-01-01T15:00:00.000Z');
        expect(iso('Sat, 01 Mar 2025 01:30:00 +0530')).toBe('2025-02-28T20:00:00.000Z');
    });

    test('reads named zones', () => {
        expect(iso('Tue, 15 Jul 2025 08:30:00 PDT')).toBe('2025-07-15T15:30:00.000Z');
        expect(iso('Mon, 3 Feb 2025 09:00 GMT')).toBe('2025-02-03T09:00:00.000Z');
    });

    test('keeps an offset written after GMT', () => {
        expect(iso('Wed, 01 Jan 2025 10:00:00 GMT+0200')).toBe('2025-01-01T08:00:00.000Z');
    });

    test('ignores trailing comments', () => {
        expect(iso('Wed, 01 Jan 2025 10:00:00 +0100 (CET)')).toBe('2025-01-01T09:00:00.000Z');
    });

    test('expands two-digit years', () => {
        expect(iso('01 Jan 99 00:00:00 +0000')).toBe('1999-01-01T00:00:00.000Z');
        expect(iso('01 Jan 24 00:00:00 +0000')).toBe('2024-01-01T00:00:00.000Z');
    });

    test('a missing zone is read as UTC', () => {
        expect(iso('01 Jan 2025 10:00:00')).toBe('2025-01-01T10:00:00.000Z');
        expect(iso('Wed, 01 Jan 2025')).toBe('2025-01-01T00:00:00.000Z');
        expect(iso('2025-01-01T10:00:00')).toBe('2025-01-01T10:00:00.000Z');
        expect(iso('2025-01-01')).toBe('2025-01-01T00:00:00.000Z');
    });

    test('an unrecognised zone name is read as UTC', () => {
        expect(iso('Wed, 01 Jan 2025 10:00:00 CEST')).toBe('2025-01-01T10:00:00.000Z');
    });

    test('reads ISO timestamps', () => {
        expect(iso('2025-03-04T05:06:07Z')).toBe('2025-03-04T05:06:07.000Z');
        expect(iso('2025-03-04T05:06:07-05:00')).toBe('2025-03-04T10:06:07.000Z');
    });

    test('returns null for missing or unreadable values', () => {
        expect(parser.parse(undefined)).toBeNull();
        expect(parser.parse(null)).toBeNull();
        expect(parser.parse('')).toBeNull();
        expect(parser.parse('   ')).toBeNull();
        expect(parser.parse('garbage')).toBeNull();
        expect(parser.parse('(no date)')).toBeNull();
    });
});
