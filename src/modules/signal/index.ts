export type PhonePatternFamily = 'parenthesized' | 'separated' | 'international' | 'digit-run';

/**
 * Pattern families, scanned in this order over the same text.
 * A number may surface once per family that matches it.
 */
export const PHONE_PATTERNS: ReadonlyArray<{ family: PhonePatternFamily; pattern: RegExp }> = [
    { family: 'parenthesized', pattern: /\(\d{3}\)\s*\d{3}[-.\s]?\d{4}/g },
    { family: 'separated', pattern: /\b\d{3}[-.\s]\d{3}[-.\s]\d{4}\b/g },
    { family: 'international', pattern: /\+\d{1,3}(?:[-.\s]?\d{2,4}){2,5}\b/g },
    { family: 'digit-run', pattern: /\b\d{10,15}\b/g },
];

export class PhoneSignalExtractor {

    /**
     * Lazily yields every phone-shaped substring of `text`, family by family.
     */
    static *extract(text: string): Generator<string, void, undefined> {
        if (!text) return;
        for (const { pattern } of PHONE_PATTERNS) {
            for (const match of text.matchAll(pattern)) {
                yield match[0];
            }
        }
    }

    static extractAll(text: string): string[] {
        return [...this.extract(text)];
    }
}

export function extractPhoneCandidates(text: string): Generator<string, void, undefined> {
    return PhoneSignalExtractor.extract(text);
}
