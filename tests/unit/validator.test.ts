/**
 * Stream Validator Tests
 * Probes run against a stubbed global fetch
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../src/observability/logger.js', () => {
    const log = {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    };
    return {
        logger: log,
        createLogger: () => log,
    };
});

import { createValidator, startsWithPlaylistMagic, type Validator } from '../../src/services/validator.service.js';

type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

const mockFetch = vi.fn<FetchFn>();
vi.stubGlobal('fetch', mockFetch);

const PLAYLIST_TYPE = { 'content-type': 'application/vnd.apple.mpegurl' };

function respond(routes: { head?: () => Response; get?: () => Response }): void {
    mockFetch.mockImplementation(async (_url, init) => {
        const route = init?.method === 'HEAD' ? routes.head : routes.get;
        if (!route) {
            throw new TypeError('fetch failed');
        }
        return route();
    });
}

describe('Stream Validator', () => {
    let validator: Validator;

    beforeEach(() => {
        mockFetch.mockReset();
        validator = createValidator({ timeoutMs: 1000, probeBytes: 512, concurrency: 4 });
    });

    afterEach(() => {
        vi.clearAllMocks();
    });

    describe('probe', () => {
        it('should accept a playlist content-type from HEAD alone', async () => {
            respond({ head: () => new Response(null, { status: 200, headers: PLAYLIST_TYPE }) });

            const result = await validator.probe('https://cdn.test/live.m3u8');

            expect(result).toEqual({ valid: true, via: 'head' });
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should fall back to a ranged read when HEAD is inconclusive', async () => {
            respond({
                head: () => new Response(null, { status: 200, headers: { 'content-type': 'application/octet-stream' } }),
                get: () => new Response('#EXTM3U\n#EXT-X-VERSION:3\n', {
                    status: 206,
                    headers: { 'content-type': 'application/octet-stream' },
                }),
            });

            const result = await validator.probe('https://cdn.test/live.m3u8');

            expect(result).toEqual({ valid: true, via: 'range' });
            expect(mockFetch).toHaveBeenCalledTimes(2);
            const [, init] = mockFetch.mock.calls[1];
            expect(init?.method).toBe('GET');
            expect(init?.headers).toEqual({ Range: 'bytes=0-511' });
        });

        it('should accept a playlist content-type on the ranged read', async () => {
            respond({
                head: () => new Response(null, { status: 405 }),
                get: () => new Response('', { status: 200, headers: { 'content-type': 'audio/x-mpegurl' } }),
            });

            expect(await validator.probe('https://cdn.test/live.m3u8')).toEqual({ valid: true, via: 'range' });
        });

        it('should accept a body with a byte order mark before the header', async () => {
            respond({
                head: () => new Response(null, { status: 200, headers: { 'content-type': 'text/plain' } }),
                get: () => new Response('\uFEFF#EXTM3U\n', { status: 200, headers: { 'content-type': 'text/plain' } }),
            });

            expect(await validator.validate('https://cdn.test/bom.m3u8')).toBe(true);
        });

        it('should validate from the leading bytes of a large body', async () => {
            respond({
                head: () => new Response(null, { status: 200, headers: { 'content-type': 'text/plain' } }),
                get: () => new Response('#EXTM3U\n' + 'x'.repeat(100000), {
                    status: 200,
                    headers: { 'content-type': 'text/plain' },
                }),
            });

            expect(await validator.validate('https://cdn.test/big.m3u8')).toBe(true);
        });

        it('should reject a 404', async () => {
            respond({
                head: () => new Response(null, { status: 404 }),
                get: () => new Response('not found', { status: 404 }),
            });

            expect(await validator.probe('https://cdn.test/gone.m3u8')).toEqual({ valid: false, reason: 'status 404' });
        });

        it('should reject an html page without the playlist header', async () => {
            respond({
                head: () => new Response(null, { status: 200, headers: { 'content-type': 'text/html' } }),
                get: () => new Response('<html><body>Login</body></html>', {
                    status: 200,
                    headers: { 'content-type': 'text/html' },
                }),
            });

            expect(await validator.probe('https://cdn.test/portal.m3u8')).toEqual({
                valid: false,
                reason: 'content mismatch (content-type text/html)',
            });
        });

        it('should reject on a transport error without a second request', async () => {
            respond({});

            expect(await validator.probe('https://down.test/a.m3u8')).toEqual({ valid: false, reason: 'fetch failed' });
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should reject when the probe times out', async () => {
            validator = createValidator({ timeoutMs: 20, probeBytes: 512, concurrency: 1 });
            mockFetch.mockImplementation((_url, init) => new Promise<Response>((_resolve, reject) => {
                init?.signal?.addEventListener('abort', () => {
                    const error = new Error('This operation was aborted');
                    error.name = 'AbortError';
                    reject(error);
                });
            }));

            expect(await validator.probe('https://slow.test/a.m3u8')).toEqual({
                valid: false,
                reason: 'timed out after 20ms',
            });
        });
    });

    describe('memoization', () => {
        it('should probe a url only once', async () => {
            respond({ head: () => new Response(null, { status: 200, headers: PLAYLIST_TYPE }) });

            const [first, second] = await Promise.all([
                validator.validate('https://cdn.test/live.m3u8'),
                validator.validate('https://cdn.test/live.m3u8'),
            ]);
            const third = await validator.validate('https://cdn.test/live.m3u8');

            expect([first, second, third]).toEqual([true, true, true]);
            expect(mockFetch).toHaveBeenCalledTimes(1);
            expect(validator.probedCount).toBe(1);
        });

        it('should not re-probe an invalid url', async () => {
            respond({});

            await validator.validate('https://down.test/a.m3u8');
            await validator.validate('https://down.test/a.m3u8');

            expect(mockFetch).toHaveBeenCalledTimes(1);
        });
    });

    describe('validateAll', () => {
        it('should keep input order and mark each candidate', async () => {
            mockFetch.mockImplementation(async (url, init) => {
                if (url.includes('bad')) {
                    return new Response(null, { status: 404 });
                }
                return init?.method === 'HEAD'
                    ? new Response(null, { status: 200, headers: PLAYLIST_TYPE })
                    : new Response('', { status: 500 });
            });

            const results = await validator.validateAll([
                { url: 'https://cdn.test/a.m3u8', source: 'A' },
                { url: 'https://cdn.test/bad.m3u8', source: 'B' },
                { url: 'https://cdn.test/c.m3u8', source: 'C' },
            ]);

            expect(results).toEqual([
                { candidate: { url: 'https://cdn.test/a.m3u8', source: 'A' }, valid: true },
                { candidate: { url: 'https://cdn.test/bad.m3u8', source: 'B' }, valid: false },
                { candidate: { url: 'https://cdn.test/c.m3u8', source: 'C' }, valid: true },
            ]);
        });
    });

    describe('startsWithPlaylistMagic', () => {
        it('should require the header at the very start', () => {
            expect(startsWithPlaylistMagic('#EXTM3U\n')).toBe(true);
            expect(startsWithPlaylistMagic(' #EXTM3U')).toBe(false);
            expect(startsWithPlaylistMagic('<html>#EXTM3U')).toBe(false);
        });
    });
});
