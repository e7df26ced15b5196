/**
 * Stream validator
 *
 * Fail-closed liveness probe for candidate urls:
 * 1. HEAD; a success status with an mpegurl content-type is enough
 * 2. otherwise a ranged GET reading only the first PROBE_BYTES bytes,
 *    accepted on an mpegurl content-type or a `#EXTM3U` body prefix
 *
 * Any error, timeout, bad status or mismatch is invalid. Results are
 * memoized per url for the lifetime of the validator.
 */
import pLimit from 'p-limit';
import { createLogger } from '../observability/logger.js';
import { probeDuration, probesTotal } from '../observability/metrics.js';
import type { Candidate, ProbeResult, ValidationResult } from '../types.js';

export const PLAYLIST_MAGIC = '#EXTM3U';
const PLAYLIST_CONTENT_TYPE_MARKER = 'mpegurl';

export interface ValidatorOptions {
    timeoutMs: number;
    /** Upper bound on body bytes read by the ranged probe */
    probeBytes: number;
    concurrency: number;
    userAgent?: string;
}

export interface Validator {
    probe(url: string): Promise<ProbeResult>;
    validate(url: string): Promise<boolean>;
    validateAll(candidates: readonly Candidate[]): Promise<ValidationResult[]>;
    /** Distinct urls probed so far */
    readonly probedCount: number;
}

class ProbeTimeoutError extends Error {
    constructor(timeoutMs: number) {
        super(`timed out after ${timeoutMs}ms`);
        this.name = 'ProbeTimeoutError';
    }
}

function hasPlaylistContentType(response: Response): boolean {
    return (response.headers.get('content-type') ?? '').toLowerCase().includes(PLAYLIST_CONTENT_TYPE_MARKER);
}

export function startsWithPlaylistMagic(text: string): boolean {
    return text.replace(/^\uFEFF/, '').startsWith(PLAYLIST_MAGIC);
}

async function cancelBody(reader: { cancel(): Promise<void> }, url: string): Promise<void> {
    try {
        await reader.cancel();
    } catch (cancelError) {
        createLogger({ url, stage: 'validate' }).debug('Body cancel failed', {
            error: cancelError instanceof Error ? cancelError.message : String(cancelError),
        });
    }
}

/**
 * Read at most maxBytes from the body, then cancel the rest of the stream
 */
async function readLeadingBytes(response: Response, maxBytes: number, url: string): Promise<string> {
    if (!response.body) {
        return '';
    }

    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let total = 0;
    try {
        while (total < maxBytes) {
            const { done, value } = await reader.read();
            if (done) {
                break;
            }
            chunks.push(value);
            total += value.byteLength;
        }
    } finally {
        await cancelBody(reader, url);
    }

    return Buffer.concat(chunks).subarray(0, maxBytes).toString('utf-8');
}

/**
 * Release a body that will not be read
 */
async function discardBody(response: Response, url: string): Promise<void> {
    if (response.body) {
        await cancelBody(response.body.getReader(), url);
    }
}

export class StreamValidator implements Validator {
    private readonly memo = new Map<string, Promise<ProbeResult>>();
    private readonly headers: Record<string, string>;

    constructor(private readonly options: ValidatorOptions) {
        this.headers = options.userAgent ? { 'User-Agent': options.userAgent } : {};
    }

    get probedCount(): number {
        return this.memo.size;
    }

    /**
     * Probe a url once; concurrent callers share the in-flight probe
     */
    probe(url: string): Promise<ProbeResult> {
        let pending = this.memo.get(url);
        if (!pending) {
            pending = this.runProbe(url);
            this.memo.set(url, pending);
        }
        return pending;
    }

    async validate(url: string): Promise<boolean> {
        const result = await this.probe(url);
        return result.valid;
    }

    /**
     * Validate candidates under the validator's own pool; output keeps input order
     */
    async validateAll(candidates: readonly Candidate[]): Promise<ValidationResult[]> {
        const limit = pLimit(this.options.concurrency);
        return Promise.all(
            candidates.map(candidate => limit(async () => ({
                candidate,
                valid: await this.validate(candidate.url),
            })))
        );
    }

    private async runProbe(url: string): Promise<ProbeResult> {
        const log = createLogger({ url, stage: 'validate' });
        const endTimer = probeDuration.startTimer();

        let result: ProbeResult;
        try {
            result = await this.probeHead(url) ?? await this.probeRange(url);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            result = { valid: false, reason };
        } finally {
            endTimer();
        }

        probesTotal.inc({ result: result.valid ? 'valid' : 'invalid' });
        if (result.valid) {
            log.debug('Stream link valid', { via: result.via });
        } else {
            log.debug('Stream link invalid', { reason: result.reason });
        }
        return result;
    }

    /**
     * Returns a result only when HEAD alone proves validity
     */
    private async probeHead(url: string): Promise<ProbeResult | null> {
        const response = await this.withTimeout(signal => fetch(url, {
            method: 'HEAD',
            headers: this.headers,
            redirect: 'follow',
            signal,
        }));

        if (response.ok && hasPlaylistContentType(response)) {
            return { valid: true, via: 'head' };
        }
        return null;
    }

    private async probeRange(url: string): Promise<ProbeResult> {
        return this.withTimeout(async signal => {
            const response = await fetch(url, {
                method: 'GET',
                headers: { ...this.headers, Range: `bytes=0-${this.options.probeBytes - 1}` },
                redirect: 'follow',
                signal,
            });

            if (!response.ok) {
                await discardBody(response, url);
                return { valid: false, reason: `status ${response.status}` };
            }
            if (hasPlaylistContentType(response)) {
                await discardBody(response, url);
                return { valid: true, via: 'range' };
            }

            const head = await readLeadingBytes(response, this.options.probeBytes, url);
            if (startsWithPlaylistMagic(head)) {
                return { valid: true, via: 'range' };
            }

            const contentType = response.headers.get('content-type') ?? 'none';
            return { valid: false, reason: `content mismatch (content-type ${contentType})` };
        });
    }

    private async withTimeout<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);
        try {
            return await fn(controller.signal);
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw new ProbeTimeoutError(this.options.timeoutMs);
            }
            throw error;
        } finally {
            clearTimeout(timeoutId);
        }
    }
}

export function createValidator(options: ValidatorOptions): Validator {
    return new StreamValidator(options);
}
