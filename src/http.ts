import { gotScraping } from 'crawlee';

import { FETCH_HEADERS } from './constants.js';

export interface HttpRequest {
    url: string;
    method: 'GET' | 'POST';
    json?: unknown;
    searchParams?: Record<string, string>;
    timeoutMs: number;
}

export interface HttpResponse {
    statusCode: number;
    body: string;
}

/** Sends one request and resolves with whatever status came back; only transport failures reject. */
export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

export const gotTransport: HttpTransport = async ({ url, method, json, searchParams, timeoutMs }) => {
    const response = await gotScraping({
        url,
        method,
        json,
        searchParams,
        headers: FETCH_HEADERS,
        responseType: 'text',
        throwHttpErrors: false,
        retry: { limit: 0 },
        timeout: { request: timeoutMs },
    });

    return { statusCode: response.statusCode, body: String(response.body) };
};
