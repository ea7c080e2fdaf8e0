import axios, { AxiosInstance } from 'axios';

const USER_AGENT = 'edna-taxonomy-resolver/1.0 (eDNA occurrence processing)';

/**
 * Minimal JSON GET client the source adapters depend on.
 * Resolves with the response body; rejects with the axios error.
 */
export interface TaxonomyHttpClient {
    get(path: string, params?: Record<string, unknown>): Promise<unknown>;
}

export function createHttpClient(baseURL: string, timeoutMs: number): TaxonomyHttpClient {
    const client: AxiosInstance = axios.create({
        baseURL,
        timeout: timeoutMs,
        headers: {
            'Accept': 'application/json',
            'User-Agent': USER_AGENT,
        },
    });

    return {
        async get(path, params) {
            const response = await client.get<unknown>(path, { params });
            return response.data;
        },
    };
}
