/**
 * Search endpoint client
 * One GET per (channel, page); the page parameter is omitted for page 1
 */
import { createLogger } from '../observability/logger.js';
import type { SearchFetcher } from '../types.js';
import type { SessionTokenGenerator } from './session-token.js';

export interface SearchClientOptions {
    baseUrl: string;
    keywordParam: string;
    tokenParam: string;
    timeoutMs: number;
    userAgent: string;
    acceptLanguage: string;
    generateToken: SessionTokenGenerator;
}

export class SearchFetchError extends Error {
    constructor(
        message: string,
        public readonly channel: string,
        public readonly page: number,
        public readonly status?: number
    ) {
        super(message);
        this.name = 'SearchFetchError';
    }
}

/**
 * Build the request url for one result page
 */
export function buildSearchUrl(
    options: Pick<SearchClientOptions, 'baseUrl' | 'keywordParam' | 'tokenParam'>,
    channel: string,
    page: number,
    token: string
): string {
    const url = new URL(options.baseUrl);
    url.searchParams.set(options.keywordParam, channel);
    url.searchParams.set(options.tokenParam, token);
    if (page > 1) {
        url.searchParams.set('page', page.toString());
    }
    return url.toString();
}

export function createSearchClient(options: SearchClientOptions): SearchFetcher {
    const headers = {
        'User-Agent': options.userAgent,
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
        'Accept-Language': options.acceptLanguage,
    };

    return async (channel: string, page: number): Promise<string> => {
        const url = buildSearchUrl(options, channel, page, options.generateToken());
        const log = createLogger({ channel, page, stage: 'search' });

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
        try {
            log.debug('Fetching search page', { url });
            const response = await fetch(url, { headers, signal: controller.signal });

            if (!response.ok) {
                throw new SearchFetchError(
                    `Search page request failed (status ${response.status})`,
                    channel,
                    page,
                    response.status
                );
            }

            return await response.text();
        } catch (error) {
            if (error instanceof SearchFetchError) {
                throw error;
            }
            if (error instanceof Error && error.name === 'AbortError') {
                throw new SearchFetchError(
                    `Search page request timed out after ${options.timeoutMs}ms`,
                    channel,
                    page
                );
            }
            const reason = error instanceof Error ? error.message : String(error);
            throw new SearchFetchError(`Search page request failed: ${reason}`, channel, page);
        } finally {
            clearTimeout(timeoutId);
        }
    };
}
