/**
 * Candidate deduplication keyed by url
 * First-seen wins: a url keeps the channel it was first inserted under
 */
import { logger } from '../observability/logger.js';
import type { Candidate } from '../types.js';

export class CandidateSet {
    private readonly byUrl = new Map<string, Candidate>();

    /**
     * Insert a candidate; returns false when its url is already present
     */
    add(candidate: Candidate): boolean {
        const existing = this.byUrl.get(candidate.url);
        if (existing) {
            if (existing.source !== candidate.source) {
                logger.debug('Duplicate url across channels, keeping first', {
                    url: candidate.url,
                    kept: existing.source,
                    dropped: candidate.source,
                });
            }
            return false;
        }
        this.byUrl.set(candidate.url, candidate);
        return true;
    }

    has(url: string): boolean {
        return this.byUrl.has(url);
    }

    get size(): number {
        return this.byUrl.size;
    }

    /** Candidates in insertion order */
    values(): Candidate[] {
        return Array.from(this.byUrl.values());
    }
}

/**
 * Merge candidates from every channel and page into a duplicate-free list
 */
export function mergeCandidates(candidates: Iterable<Candidate>): Candidate[] {
    const set = new CandidateSet();
    for (const candidate of candidates) {
        set.add(candidate);
    }
    return set.values();
}
