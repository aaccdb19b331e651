import { PhoneCandidate, SourceDescriptor } from '../../types';
import { PhoneNormalizer } from '../normalizer';
import { PhoneValidator } from '../validity';

export function createCandidate(rawMatch: string, source: SourceDescriptor, countryCode = '1'): PhoneCandidate {
    const { isValid, validationScore } = PhoneValidator.validate(rawMatch, countryCode);
    return Object.freeze({
        rawMatch,
        normalized: PhoneNormalizer.normalize(rawMatch, countryCode),
        validationScore,
        isValid,
        source,
        totalScore: validationScore * source.baseWeight,
    });
}

function compareText(a: string, b: string): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

/**
 * Total order over candidates: higher totalScore first, ties broken by
 * normalized number, then source name, then raw text (all ascending).
 * Returns > 0 when `a` ranks above `b`.
 */
export function compareCandidates(a: PhoneCandidate, b: PhoneCandidate): number {
    if (a.totalScore !== b.totalScore) return a.totalScore > b.totalScore ? 1 : -1;
    return compareText(b.normalized, a.normalized)
        || compareText(b.source.name, a.source.name)
        || compareText(b.rawMatch, a.rawMatch);
}

/**
 * Holds the best valid candidate seen during one resolution.
 * `offer` is synchronous, so fetches settling on the event loop feed it one
 * at a time and the held candidate depends only on the set offered.
 */
export class ConfidenceAggregator {
    private held: PhoneCandidate | null = null;

    offer(candidate: PhoneCandidate): boolean {
        if (!candidate.isValid) return false;
        if (this.held && compareCandidates(candidate, this.held) <= 0) return false;
        this.held = candidate;
        return true;
    }

    offerAll(candidates: Iterable<PhoneCandidate>): void {
        for (const c of candidates) this.offer(c);
    }

    get best(): PhoneCandidate | null {
        return this.held;
    }
}
