import axios from 'axios';
import { z } from 'zod';
import { getConfig } from '../../config';
import { AuthoritativeContact, AuthoritativeLookupClient, SocialProfiles } from '../../types';
import { AuthoritativeUnavailableError } from '../../utils/errors';
import { HttpClient } from '../fetcher';
import { Logger } from '../observability';

/**
 * Remaining-call budget reported by the lookup service.
 * `resetAt` is the epoch second at which the budget refills.
 */
export class RateLimitWindow {
    remaining: number;
    resetAt: number;

    constructor(remaining = 10, resetAt = 0) {
        this.remaining = remaining;
        this.resetAt = resetAt;
    }

    canCall(nowMs: number = Date.now()): boolean {
        if (nowMs / 1000 < this.resetAt) {
            return this.remaining > 0;
        }
        return true;
    }

    update(headers: Record<string, unknown>): void {
        const remaining = readNumericHeader(headers, 'x-rate-limit-remaining');
        const resetAt = readNumericHeader(headers, 'x-rate-limit-reset');

        this.remaining = remaining ?? Math.max(0, this.remaining - 1);
        if (resetAt !== undefined) this.resetAt = resetAt;
    }
}

function readNumericHeader(headers: Record<string, unknown>, name: string): number | undefined {
    const value = headers[name] ?? headers[name.toUpperCase()];
    const raw = Array.isArray(value) ? value[0] : value;
    if (typeof raw !== 'string' && typeof raw !== 'number') return undefined;
    const n = Number.parseInt(String(raw), 10);
    return Number.isFinite(n) ? n : undefined;
}

// Shared by every client in the process.
export const sharedRateLimitWindow = new RateLimitWindow();

const PhoneEntrySchema = z.union([
    z.string(),
    z.object({ number: z.string().nullish() }).passthrough(),
]);

const LookupResponseSchema = z.object({
    name: z.string().nullish(),
    current_title: z.string().nullish(),
    title: z.string().nullish(),
    current_employer: z.string().nullish(),
    email: z.string().nullish(),
    phone_numbers: z.array(PhoneEntrySchema).nullish(),
    linkedin_url: z.string().nullish(),
    twitter_url: z.string().nullish(),
}).passthrough();

type LookupResponse = z.infer<typeof LookupResponseSchema>;

export interface RocketReachSettings {
    apiKey?: string;
    baseUrl: string;
    timeoutMs: number;
}

export class RocketReachClient implements AuthoritativeLookupClient {
    readonly name = 'RocketReach API';
    private http: HttpClient;

    constructor(
        private settings: RocketReachSettings,
        http?: HttpClient,
        private rateWindow: RateLimitWindow = sharedRateLimitWindow
    ) {
        this.http = http ?? axios.create();
    }

    static fromConfig(): RocketReachClient {
        return new RocketReachClient(getConfig().authority);
    }

    /**
     * Null whenever the service has nothing usable: not found, no API key,
     * rate limited, or an unexpected reply.
     */
    async lookup(personName: string, companyName: string): Promise<AuthoritativeContact | null> {
        if (!this.settings.apiKey) {
            Logger.debug('[Authority] ROCKETREACH_API_KEY is not configured, skipping lookup');
            return null;
        }

        try {
            const apiKey = this.settings.apiKey;
            this.assertWithinRateLimit();

            const response = await this.http.get(`${this.settings.baseUrl}/lookup`, {
                headers: {
                    'Api-Key': apiKey,
                    'Content-Type': 'application/json',
                },
                params: {
                    name: personName,
                    current_employer: companyName,
                },
                timeout: this.settings.timeoutMs,
                validateStatus: () => true,
            });

            this.rateWindow.update(response.headers ?? {});

            if (response.status === 404) return null;
            if (response.status !== 200) {
                throw new AuthoritativeUnavailableError(`RocketReach responded ${response.status}`, { status: response.status });
            }
            if (!response.data) return null;

            const parsed = LookupResponseSchema.safeParse(response.data);
            if (!parsed.success) {
                throw new AuthoritativeUnavailableError('Malformed RocketReach lookup response', {
                    issues: parsed.error.issues.length,
                });
            }
            return this.toContact(parsed.data, personName, companyName);
        } catch (e) {
            if (e instanceof AuthoritativeUnavailableError) {
                Logger.warn(`[Authority] ${e.message}`, { person_name: personName, company_name: companyName });
            } else {
                Logger.logError('[Authority] Lookup failed', e instanceof Error ? e : new Error(String(e)), {
                    person_name: personName,
                    company_name: companyName,
                });
            }
            return null;
        }
    }

    private assertWithinRateLimit(): void {
        if (!this.rateWindow.canCall()) {
            throw new AuthoritativeUnavailableError('RocketReach rate limit reached', {
                reset_at: this.rateWindow.resetAt,
            });
        }
    }

    private toContact(data: LookupResponse, personName: string, companyName: string): AuthoritativeContact {
        const socialProfiles: SocialProfiles = {};
        if (data.linkedin_url) socialProfiles.linkedin = data.linkedin_url;
        if (data.twitter_url) socialProfiles.twitter = data.twitter_url;

        return {
            name: data.name ?? personName,
            company: data.current_employer ?? companyName,
            position: data.current_title ?? data.title ?? undefined,
            email: data.email ?? undefined,
            phone: firstPhone(data.phone_numbers),
            socialProfiles,
        };
    }
}

function firstPhone(entries: LookupResponse['phone_numbers']): string | undefined {
    for (const entry of entries ?? []) {
        const value = typeof entry === 'string' ? entry : entry.number;
        if (value && value.trim()) return value.trim();
    }
    return undefined;
}
