import { getConfig } from '../config';
import { RocketReachClient } from '../modules/authority';
import { Decider } from '../modules/decider';
import { contentExtractor } from '../modules/extractor';
import { AxiosHttpFetcher } from '../modules/fetcher';
import { Logger } from '../modules/observability';
import { SourceFetchPool } from '../modules/pool';
import { ConfidenceAggregator, createCandidate } from '../modules/scorer';
import { PhoneSignalExtractor } from '../modules/signal';
import { buildSocialProfiles, mergeSocialProfiles } from '../modules/social';
import { loadSourceTiers } from '../modules/sources';
import {
    AuthoritativeContact,
    AuthoritativeLookupClient,
    ContactQuery,
    PhoneCandidate,
    RawSourceResult,
    ResolutionOutcome,
    ResolvedContact,
    SocialProfiles,
    SourceAttempt,
    SourceDescriptor,
    SourceTier,
    TierPolicy,
} from '../types';

export interface ContactResolverOptions {
    authority: AuthoritativeLookupClient;
    pool: SourceFetchPool;
    tiers: readonly SourceTier[];
    tierPolicy?: TierPolicy;
    eagerCancel?: boolean;
    countryCode?: string;
}

type ResolutionState = {
    query: ContactQuery;
    aggregator: ConfidenceAggregator;
    attempts: SourceAttempt[];
};

/**
 * Authoritative lookup first, then the fallback tiers in order.
 * A well-formed query always resolves to a ResolvedContact; missing
 * evidence only lowers the answer to `phone: null`.
 */
export class ContactResolver {
    private readonly tierPolicy: TierPolicy;
    private readonly eagerCancel: boolean;
    private readonly countryCode: string;

    constructor(private options: ContactResolverOptions) {
        this.tierPolicy = options.tierPolicy ?? 'first-valid-tier';
        this.eagerCancel = options.eagerCancel ?? false;
        this.countryCode = options.countryCode ?? '1';
    }

    static fromConfig(overrides: Partial<ContactResolverOptions> = {}): ContactResolver {
        const config = getConfig();
        return new ContactResolver({
            authority: overrides.authority ?? RocketReachClient.fromConfig(),
            pool: overrides.pool ?? new SourceFetchPool(new AxiosHttpFetcher(), contentExtractor, {
                timeoutMs: config.fetcher.timeoutMs,
                concurrency: config.fetcher.concurrency,
            }),
            tiers: overrides.tiers ?? loadSourceTiers(config.resolution.sourcesPath),
            tierPolicy: overrides.tierPolicy ?? config.resolution.tierPolicy,
            eagerCancel: overrides.eagerCancel ?? config.resolution.eagerCancel,
            countryCode: overrides.countryCode ?? config.resolution.defaultCountryCode,
        });
    }

    async resolve(query: ContactQuery): Promise<ResolvedContact> {
        const outcome = await this.resolveWithTrace(query);
        return outcome.contact;
    }

    async resolveWithTrace(query: ContactQuery): Promise<ResolutionOutcome> {
        const start = Date.now();
        const state: ResolutionState = { query, aggregator: new ConfidenceAggregator(), attempts: [] };
        let socialProfiles: SocialProfiles = buildSocialProfiles(query);

        Logger.info(`[Resolver] Resolving ${query.personName} @ ${query.companyName}`, {
            person_name: query.personName,
            company_name: query.companyName,
        });

        // 1. Authoritative lookup
        const authoritative = await this.lookupAuthoritative(query);
        if (authoritative) {
            socialProfiles = mergeSocialProfiles(socialProfiles, authoritative.socialProfiles);
            if (authoritative.phone) {
                const source: SourceDescriptor = {
                    name: this.options.authority.name,
                    endpointTemplate: '',
                    baseWeight: 1,
                };
                const candidate = createCandidate(authoritative.phone, source, this.countryCode);
                if (state.aggregator.offer(candidate)) {
                    return this.finish(state, socialProfiles, true, start);
                }
                Logger.warn(`[Resolver] ${source.name} phone failed validation, falling back`, {
                    person_name: query.personName,
                    company_name: query.companyName,
                });
            }
        }

        // 2. Fallback cascade
        for (const tier of this.options.tiers) {
            await this.runTier(state, tier);

            const best = state.aggregator.best;
            Logger.info(`[Resolver] Tier "${tier.name}" done`, {
                source: best?.source.name,
                total_score: best?.totalScore,
            });
            if (best && this.tierPolicy === 'first-valid-tier') break;
        }

        return this.finish(state, socialProfiles, false, start);
    }

    private async lookupAuthoritative(query: ContactQuery): Promise<AuthoritativeContact | null> {
        try {
            return await this.options.authority.lookup(query.personName, query.companyName);
        } catch (e) {
            Logger.logError(`[Resolver] ${this.options.authority.name} lookup failed`, e instanceof Error ? e : new Error(String(e)), {
                person_name: query.personName,
                company_name: query.companyName,
            });
            return null;
        }
    }

    private async runTier(state: ResolutionState, tier: SourceTier): Promise<void> {
        const controller = new AbortController();
        const stopEarly = this.eagerCancel && this.tierPolicy === 'first-valid-tier';

        await this.options.pool.fetchTier(state.query, tier.sources, {
            signal: controller.signal,
            onResult: (result) => {
                if (controller.signal.aborted) {
                    // tier already closed, late evidence is not considered
                    state.attempts.push(this.attemptOf(tier, result, 0, 0));
                    return;
                }
                const accepted = this.harvest(state, tier, result);
                if (stopEarly && accepted && state.aggregator.best) {
                    controller.abort();
                }
            },
        });
    }

    /**
     * Feeds one source's text through extraction and scoring.
     * Returns whether any valid candidate came out of it.
     */
    private harvest(state: ResolutionState, tier: SourceTier, result: RawSourceResult): boolean {
        let candidates: PhoneCandidate[] = [];
        try {
            for (const raw of PhoneSignalExtractor.extract(result.text)) {
                candidates.push(createCandidate(raw, result.source, this.countryCode));
            }
        } catch (e) {
            candidates = [];
            Logger.logError(`[Resolver] Failed to process ${result.source.name}`, e instanceof Error ? e : new Error(String(e)), {
                source: result.source.name,
                url: result.url,
            });
        }

        state.aggregator.offerAll(candidates);
        const valid = candidates.filter((c) => c.isValid).length;
        state.attempts.push(this.attemptOf(tier, result, candidates.length, valid));
        return valid > 0;
    }

    private attemptOf(tier: SourceTier, result: RawSourceResult, candidates: number, validCandidates: number): SourceAttempt {
        return {
            tier: tier.name,
            source: result.source.name,
            url: result.url,
            fetchError: result.fetchError,
            candidates,
            validCandidates,
        };
    }

    private finish(state: ResolutionState, socialProfiles: SocialProfiles, authoritativeHit: boolean, start: number): ResolutionOutcome {
        const contact = Decider.decide(state.aggregator.best, socialProfiles);
        const durationMs = Date.now() - start;

        Logger.info(`[Resolver] ${contact.phone ? `Resolved ${contact.phone} (${contact.confidenceLevel})` : 'No phone found'}`, {
            person_name: state.query.personName,
            company_name: state.query.companyName,
            source: contact.source ?? undefined,
            duration_ms: durationMs,
        });

        return { contact, authoritativeHit, attempts: state.attempts, durationMs };
    }
}
