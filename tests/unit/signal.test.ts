import { describe, expect, it } from 'vitest';
import { extractPhoneCandidates, PhoneSignalExtractor } from '../../src/modules/signal';

describe('PhoneSignalExtractor', () => {
    it('finds a parenthesized area-code number in prose', () => {
        expect(PhoneSignalExtractor.extractAll('Call us at (415) 555-0199 today')).toEqual(['(415) 555-0199']);
    });

    it('finds dashed and dotted numbers', () => {
        expect(PhoneSignalExtractor.extractAll('Office: 415-555-0199 or 415.555.0100')).toEqual([
            '415-555-0199',
            '415.555.0100',
        ]);
    });

    it('finds international numbers with a plus prefix', () => {
        expect(PhoneSignalExtractor.extractAll('London office +44 20 7946 0958.')).toEqual(['+44 20 7946 0958']);
    });

    it('yields pattern families in order rather than text order', () => {
        expect(PhoneSignalExtractor.extractAll('Dial 4155550199 or (212) 555-0142')).toEqual([
            '(212) 555-0142',
            '4155550199',
        ]);
    });

    it('keeps duplicate raw matches', () => {
        expect(PhoneSignalExtractor.extractAll('415-555-0199, again: 415-555-0199')).toEqual([
            '415-555-0199',
            '415-555-0199',
        ]);
    });

    it('returns nothing for text without phone-shaped substrings', () => {
        expect(PhoneSignalExtractor.extractAll('Founded in 2024, 42 employees')).toEqual([]);
        expect(PhoneSignalExtractor.extractAll('')).toEqual([]);
    });

    it('is lazy', () => {
        const matches = extractPhoneCandidates('(415) 555-0199 and 212-555-0142');
        expect(matches.next().value).toBe('(415) 555-0199');
        expect(matches.next().value).toBe('212-555-0142');
        expect(matches.next().done).toBe(true);
    });
});
