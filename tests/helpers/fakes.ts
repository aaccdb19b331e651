import {
    AuthoritativeContact,
    AuthoritativeLookupClient,
    HttpFetcher,
    HttpFetchOptions,
    HttpResponse,
    TextExtractor,
} from '../../src/types';
import { NetworkError } from '../../src/utils/errors';

export type Route =
    | { body: string; delayMs?: number }
    | { error: Error; delayMs?: number }
    | 'hang';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * In-process HttpFetcher answering from a URL table.
 * Unknown URLs fail with a CONNECTION error.
 */
export class ScriptedFetcher implements HttpFetcher {
    readonly requested: string[] = [];
    private inFlight = 0;
    maxInFlight = 0;

    constructor(private routes: Record<string, Route> = {}) { }

    async fetch(url: string, _options: HttpFetchOptions): Promise<HttpResponse> {
        this.requested.push(url);
        const route = this.routes[url];

        if (route === 'hang') {
            return new Promise<never>(() => undefined);
        }

        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
            if (!route) throw new NetworkError(`connect ECONNREFUSED ${url}`, 'CONNECTION', { url });
            if (route.delayMs) await sleep(route.delayMs);
            if ('error' in route) throw route.error;
            return { statusCode: 200, body: route.body, finalUrl: url };
        } finally {
            this.inFlight--;
        }
    }
}

export const passthroughExtractor: TextExtractor = {
    extract: (html) => html,
};

export class FakeAuthority implements AuthoritativeLookupClient {
    readonly name = 'RocketReach API';
    calls = 0;

    constructor(private contact: AuthoritativeContact | null = null) { }

    async lookup(_personName: string, _companyName: string): Promise<AuthoritativeContact | null> {
        this.calls++;
        return this.contact;
    }
}
