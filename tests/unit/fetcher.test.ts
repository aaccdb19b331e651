import { AxiosError } from 'axios';
import { describe, expect, it, vi } from 'vitest';
import { AxiosHttpFetcher } from '../../src/modules/fetcher';
import { NetworkError } from '../../src/utils/errors';

type RequestConfig = { signal: AbortSignal; timeout: number; responseType: string };

function hangUntilAborted(_url: string, config: RequestConfig): Promise<never> {
    return new Promise((_, reject) => {
        config.signal.addEventListener('abort', () => reject(new Error('canceled')));
    });
}

async function failureOf(promise: Promise<unknown>): Promise<NetworkError> {
    try {
        await promise;
    } catch (e) {
        if (e instanceof NetworkError) return e;
        throw e;
    }
    throw new Error('expected the fetch to fail');
}

describe('AxiosHttpFetcher', () => {
    it('returns the body of a 2xx response', async () => {
        const get = vi.fn().mockResolvedValue({
            status: 200,
            data: '<p>hi</p>',
            request: { res: { responseUrl: 'https://www.acmecorp.com/contact/' } },
        });
        const fetcher = new AxiosHttpFetcher({ get });

        const response = await fetcher.fetch('https://www.acmecorp.com/contact', { timeoutMs: 1000 });
        expect(response).toEqual({
            statusCode: 200,
            body: '<p>hi</p>',
            finalUrl: 'https://www.acmecorp.com/contact/',
        });
        expect(get).toHaveBeenCalledWith('https://www.acmecorp.com/contact', expect.objectContaining({
            timeout: 1000,
            responseType: 'text',
        }));
    });

    it('stringifies non-text bodies and falls back to the requested URL', async () => {
        const get = vi.fn().mockResolvedValue({ status: 200, data: { phone: '415-555-0199' } });
        const fetcher = new AxiosHttpFetcher({ get });

        const response = await fetcher.fetch('https://api.test/x', { timeoutMs: 1000 });
        expect(response.body).toBe('{"phone":"415-555-0199"}');
        expect(response.finalUrl).toBe('https://api.test/x');
    });

    it('rejects non-2xx statuses with HTTP_STATUS', async () => {
        const get = vi.fn().mockResolvedValue({ status: 404, data: 'not found' });
        const error = await failureOf(new AxiosHttpFetcher({ get }).fetch('https://a.test/', { timeoutMs: 1000 }));
        expect(error.kind).toBe('HTTP_STATUS');
        expect(error.context).toMatchObject({ status: 404 });
    });

    it('classifies connection failures', async () => {
        const get = vi.fn().mockRejectedValue(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'));
        const error = await failureOf(new AxiosHttpFetcher({ get }).fetch('https://a.test/', { timeoutMs: 1000 }));
        expect(error.kind).toBe('CONNECTION');
    });

    it('classifies axios timeouts', async () => {
        const get = vi.fn().mockRejectedValue(new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED'));
        const error = await failureOf(new AxiosHttpFetcher({ get }).fetch('https://a.test/', { timeoutMs: 1000 }));
        expect(error.kind).toBe('TIMEOUT');
    });

    it('aborts the request once its own deadline passes', async () => {
        const get = vi.fn().mockImplementation(hangUntilAborted);
        const error = await failureOf(new AxiosHttpFetcher({ get }).fetch('https://a.test/', { timeoutMs: 20 }));
        expect(error.kind).toBe('TIMEOUT');
    });

    it('follows the caller signal', async () => {
        const get = vi.fn().mockImplementation(hangUntilAborted);
        const controller = new AbortController();
        const pending = new AxiosHttpFetcher({ get }).fetch('https://a.test/', {
            timeoutMs: 5000,
            signal: controller.signal,
        });
        controller.abort();

        const error = await failureOf(pending);
        expect(error.kind).toBe('CANCELLED');
    });

    it('refuses to start after cancellation', async () => {
        const get = vi.fn();
        const controller = new AbortController();
        controller.abort();

        const error = await failureOf(new AxiosHttpFetcher({ get }).fetch('https://a.test/', {
            timeoutMs: 1000,
            signal: controller.signal,
        }));
        expect(error.kind).toBe('CANCELLED');
        expect(get).not.toHaveBeenCalled();
    });
});
