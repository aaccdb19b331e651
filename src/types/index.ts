export type ContactQuery = {
    readonly personName: string;
    readonly companyName: string;
};

export type SourceDescriptor = {
    readonly name: string;
    readonly endpointTemplate: string;
    readonly baseWeight: number; // (0, 1]
};

export type SourceTier = {
    readonly name: string;
    readonly sources: readonly SourceDescriptor[];
};

export type FetchErrorKind = 'TIMEOUT' | 'CONNECTION' | 'HTTP_STATUS' | 'CANCELLED';

export type RawSourceResult = {
    source: SourceDescriptor;
    url: string;
    text: string;
    statusCode?: number;
    fetchError?: FetchErrorKind;
};

export type PhoneValidation = {
    isValid: boolean;
    validationScore: number; // [0, 1]
};

export type PhoneCandidate = {
    readonly rawMatch: string;
    readonly normalized: string;
    readonly validationScore: number;
    readonly isValid: boolean;
    readonly source: SourceDescriptor;
    readonly totalScore: number; // validationScore * source.baseWeight
};

export enum ConfidenceLevel {
    HIGH = 'HIGH',
    MEDIUM = 'MEDIUM',
    LOW = 'LOW',
}

export type SocialProfiles = Record<string, string>;

export type ResolvedContact = {
    phone: string | null;
    confidenceLevel: ConfidenceLevel;
    source: string | null;
    validationScore: number | null;
    socialProfiles: SocialProfiles;
};

export type SourceAttempt = {
    tier: string;
    source: string;
    url: string;
    fetchError?: FetchErrorKind;
    candidates: number;
    validCandidates: number;
};

export type ResolutionOutcome = {
    contact: ResolvedContact;
    authoritativeHit: boolean;
    attempts: SourceAttempt[];
    durationMs: number;
};

export type TierPolicy = 'first-valid-tier' | 'exhaustive';

// Collaborators

export type AuthoritativeContact = {
    name?: string;
    company?: string;
    position?: string;
    email?: string;
    phone?: string;
    socialProfiles: SocialProfiles;
};

export interface AuthoritativeLookupClient {
    readonly name: string;
    lookup(personName: string, companyName: string): Promise<AuthoritativeContact | null>;
}

export type HttpResponse = {
    statusCode: number;
    body: string;
    finalUrl: string;
};

export type HttpFetchOptions = {
    timeoutMs: number;
    signal?: AbortSignal;
};

export interface HttpFetcher {
    fetch(url: string, options: HttpFetchOptions): Promise<HttpResponse>;
}

export interface TextExtractor {
    extract(html: string, url: string): string | null;
}
