import pLimit from 'p-limit';
import { ContactQuery, HttpFetcher, HttpResponse, RawSourceResult, SourceDescriptor, TextExtractor } from '../../types';
import { NetworkError } from '../../utils/errors';
import { Logger } from '../observability';
import { renderEndpoint } from '../sources';

export interface SourceFetchPoolSettings {
    timeoutMs: number;
    concurrency: number;
}

export interface FetchTierOptions {
    signal?: AbortSignal;
    onResult?: (result: RawSourceResult) => void;
}

/**
 * Fetches one tier of sources side by side. Every source settles into a
 * RawSourceResult: failures are recorded on the result, never thrown.
 */
export class SourceFetchPool {
    constructor(
        private fetcher: HttpFetcher,
        private extractor: TextExtractor,
        private settings: SourceFetchPoolSettings
    ) { }

    async fetchTier(
        query: ContactQuery,
        sources: readonly SourceDescriptor[],
        options: FetchTierOptions = {}
    ): Promise<RawSourceResult[]> {
        const limit = pLimit(this.settings.concurrency);

        return Promise.all(sources.map((source) => limit(async () => {
            const result = await this.fetchSource(query, source, options.signal);
            if (options.onResult) {
                try {
                    options.onResult(result);
                } catch (e) {
                    Logger.logError(`[Pool] Result handler failed for ${source.name}`, e instanceof Error ? e : new Error(String(e)), {
                        source: source.name,
                    });
                }
            }
            return result;
        })));
    }

    async fetchSource(query: ContactQuery, source: SourceDescriptor, signal?: AbortSignal): Promise<RawSourceResult> {
        const url = renderEndpoint(source.endpointTemplate, query);

        let response: HttpResponse;
        try {
            response = await this.fetchWithDeadline(url, signal);
        } catch (e) {
            const fetchError = e instanceof NetworkError ? e.kind : 'CONNECTION';
            const status = e instanceof NetworkError ? e.context?.status : undefined;
            const statusCode = typeof status === 'number' ? status : undefined;
            Logger.debug(`[Pool] ${source.name} -> ${fetchError}`, { source: source.name, url });
            return { source, url, text: '', fetchError, statusCode };
        }

        let text = '';
        try {
            text = this.extractor.extract(response.body, response.finalUrl) ?? '';
        } catch (e) {
            Logger.logError(`[Pool] Text extraction failed for ${source.name}`, e instanceof Error ? e : new Error(String(e)), {
                source: source.name,
                url,
            });
        }
        return { source, url, text, statusCode: response.statusCode };
    }

    private async fetchWithDeadline(url: string, parent?: AbortSignal): Promise<HttpResponse> {
        const { timeoutMs } = this.settings;
        if (parent?.aborted) {
            throw new NetworkError(`Cancelled: ${url}`, 'CANCELLED', { url });
        }

        const controller = new AbortController();
        let rejectDeadline: (reason: NetworkError) => void = () => undefined;
        const deadline = new Promise<never>((_, reject) => {
            rejectDeadline = reject;
        });

        const timer = setTimeout(() => {
            controller.abort();
            rejectDeadline(new NetworkError(`Timed out after ${timeoutMs}ms: ${url}`, 'TIMEOUT', { url }));
        }, timeoutMs);
        const onParentAbort = () => {
            controller.abort();
            rejectDeadline(new NetworkError(`Cancelled: ${url}`, 'CANCELLED', { url }));
        };
        parent?.addEventListener('abort', onParentAbort, { once: true });

        try {
            return await Promise.race([
                this.fetcher.fetch(url, { timeoutMs, signal: controller.signal }),
                deadline,
            ]);
        } finally {
            clearTimeout(timer);
            parent?.removeEventListener('abort', onParentAbort);
        }
    }
}
