import axios, { AxiosInstance } from 'axios';
import { getConfig } from '../../config';
import { FetchErrorKind, HttpFetcher, HttpFetchOptions, HttpResponse } from '../../types';
import { NetworkError } from '../../utils/errors';

export type HttpClient = Pick<AxiosInstance, 'get'>;

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);

export class AxiosHttpFetcher implements HttpFetcher {
    private client: HttpClient;

    constructor(client?: HttpClient) {
        this.client = client ?? axios.create({
            maxRedirects: 5,
            headers: {
                'User-Agent': getConfig().fetcher.userAgent,
                'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                'Accept-Language': 'en-US,en;q=0.9',
            },
        });
    }

    /**
     * GET with its own timeout. Resolves on 2xx only; everything else
     * rejects with a NetworkError carrying the failure kind.
     */
    async fetch(url: string, options: HttpFetchOptions): Promise<HttpResponse> {
        const { timeoutMs, signal } = options;
        if (signal?.aborted) {
            throw new NetworkError(`Fetch cancelled before start: ${url}`, 'CANCELLED', { url });
        }

        const controller = new AbortController();
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, timeoutMs);
        const onAbort = () => controller.abort();
        signal?.addEventListener('abort', onAbort, { once: true });

        try {
            const response = await this.client.get(url, {
                signal: controller.signal,
                timeout: timeoutMs,
                responseType: 'text',
                validateStatus: () => true,
            });

            if (response.status < 200 || response.status >= 300) {
                throw new NetworkError(`HTTP ${response.status} for ${url}`, 'HTTP_STATUS', { url, status: response.status });
            }

            return {
                statusCode: response.status,
                body: typeof response.data === 'string' ? response.data : JSON.stringify(response.data),
                finalUrl: response.request?.res?.responseUrl || url,
            };
        } catch (error) {
            if (error instanceof NetworkError) throw error;
            const kind = this.classify(error, timedOut, signal?.aborted === true);
            const reason = error instanceof Error ? error.message : String(error);
            throw new NetworkError(`${kind} fetching ${url}: ${reason}`, kind, { url });
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        }
    }

    private classify(error: unknown, timedOut: boolean, cancelled: boolean): FetchErrorKind {
        if (cancelled) return 'CANCELLED';
        if (timedOut) return 'TIMEOUT';
        if (axios.isAxiosError(error) && error.code && TIMEOUT_CODES.has(error.code)) return 'TIMEOUT';
        return 'CONNECTION';
    }
}
