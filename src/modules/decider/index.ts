import { ConfidenceLevel, PhoneCandidate, ResolvedContact, SocialProfiles } from '../../types';

export const HIGH_CONFIDENCE_THRESHOLD = 0.8;
export const MEDIUM_CONFIDENCE_THRESHOLD = 0.5;

export class Decider {

    // Both thresholds are exclusive: 0.8 is MEDIUM, 0.5 is LOW.
    static confidenceLevelFor(totalScore: number): ConfidenceLevel {
        if (totalScore > HIGH_CONFIDENCE_THRESHOLD) return ConfidenceLevel.HIGH;
        if (totalScore > MEDIUM_CONFIDENCE_THRESHOLD) return ConfidenceLevel.MEDIUM;
        return ConfidenceLevel.LOW;
    }

    static decide(winner: PhoneCandidate | null, socialProfiles: SocialProfiles): ResolvedContact {
        if (!winner || !winner.isValid) {
            return {
                phone: null,
                confidenceLevel: ConfidenceLevel.LOW,
                source: null,
                validationScore: null,
                socialProfiles: { ...socialProfiles },
            };
        }

        return {
            phone: winner.normalized,
            confidenceLevel: this.confidenceLevelFor(winner.totalScore),
            source: winner.source.name,
            validationScore: winner.validationScore,
            socialProfiles: { ...socialProfiles },
        };
    }
}
