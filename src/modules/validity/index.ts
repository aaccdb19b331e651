import { PhoneValidation } from '../../types';
import { PhoneNormalizer } from '../normalizer';

export const TOLL_FREE_PREFIXES: ReadonlySet<string> = new Set(['800', '844', '855', '866', '877', '888']);

const JUNK_SEQUENCES: ReadonlySet<string> = new Set(['1234567890', '0123456789']);

const NATIONAL_PATTERN = /^\d{3}[-.\s]?\d{3}[-.\s]?\d{4}$/;
const PARENTHESIZED_PATTERN = /^\(\d{3}\)\s*\d{3}[-.\s]?\d{4}$/;
const INTERNATIONAL_PATTERN = /^\+\d{1,3}[-.\s]?\d[\d\s.-]{5,}$/;

export const SIGNAL_WEIGHTS = {
    tenDigits: 0.4,
    national: 0.3,
    parenthesized: 0.3,
    international: 0.2,
    tollFree: 0.2,
} as const;

const REJECTED: PhoneValidation = { isValid: false, validationScore: 0 };

export class PhoneValidator {

    /**
     * Scores how plausible a raw match is as a reachable phone number.
     * Signals are additive and the total is capped at 1.
     */
    static validate(rawMatch: string, countryCode = '1'): PhoneValidation {
        const raw = rawMatch.trim();
        const digits = PhoneNormalizer.digitsOf(raw);

        if (digits.length < 10 || digits.length > 15) {
            return REJECTED;
        }

        const national = PhoneNormalizer.nationalDigits(raw, countryCode);
        if (this.isJunk(digits, national)) {
            return REJECTED;
        }

        let score = 0;
        if (national.length === 10) score += SIGNAL_WEIGHTS.tenDigits;
        if (NATIONAL_PATTERN.test(raw)) score += SIGNAL_WEIGHTS.national;
        if (PARENTHESIZED_PATTERN.test(raw)) score += SIGNAL_WEIGHTS.parenthesized;
        if (INTERNATIONAL_PATTERN.test(raw)) score += SIGNAL_WEIGHTS.international;
        if (national.length === 10 && TOLL_FREE_PREFIXES.has(national.substring(0, 3))) {
            score += SIGNAL_WEIGHTS.tollFree;
        }

        const validationScore = Math.min(1, Math.round(score * 100) / 100);
        return { isValid: validationScore > 0, validationScore };
    }

    static isJunk(digits: string, national: string): boolean {
        if (/^(\d)\1+$/.test(digits) || /^(\d)\1+$/.test(national)) return true;
        return JUNK_SEQUENCES.has(digits) || JUNK_SEQUENCES.has(national);
    }
}
