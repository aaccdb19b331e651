export { ContactResolver } from './pipeline';
export type { ContactResolverOptions } from './pipeline';
export { getConfig, loadConfig, resetConfig, buildConfig } from './config';
export type { Config } from './config';
export { RocketReachClient, RateLimitWindow, sharedRateLimitWindow } from './modules/authority';
export { Decider } from './modules/decider';
export { ContentExtractor, contentExtractor } from './modules/extractor';
export { AxiosHttpFetcher } from './modules/fetcher';
export { Exporter, toDisplayRecord } from './modules/exporter';
export type { DisplayRecord } from './modules/exporter';
export { PhoneNormalizer } from './modules/normalizer';
export { Logger, ResolutionMetrics } from './modules/observability';
export { SourceFetchPool } from './modules/pool';
export { ConfidenceAggregator, compareCandidates, createCandidate } from './modules/scorer';
export { PhoneSignalExtractor, extractPhoneCandidates } from './modules/signal';
export { buildSocialProfiles, mergeSocialProfiles } from './modules/social';
export { loadSourceTiers, parseSourceTiers, renderEndpoint } from './modules/sources';
export { PhoneValidator } from './modules/validity';
export * from './utils/errors';
export { Validators } from './utils/validators';
export { SlidingWindowRateLimiter } from './utils/rate_limit';
export { ConfidenceLevel } from './types';
export type {
    AuthoritativeContact,
    AuthoritativeLookupClient,
    ContactQuery,
    FetchErrorKind,
    HttpFetcher,
    HttpResponse,
    PhoneCandidate,
    RawSourceResult,
    ResolutionOutcome,
    ResolvedContact,
    SourceDescriptor,
    SourceTier,
    TextExtractor,
    TierPolicy,
} from './types';
