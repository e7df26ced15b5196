/**
 * Shared pipeline types
 */

/** One search request: a channel keyword and a 1-based result page */
export interface Task {
    readonly channel: string;
    readonly page: number;
}

/** A normalized absolute stream url and the channel it was found under */
export interface Candidate {
    readonly url: string;
    readonly source: string;
}

export type ProbeResult =
    | { valid: true; via: 'head' | 'range' }
    | { valid: false; reason: string };

export interface ValidationResult {
    candidate: Candidate;
    valid: boolean;
}

export interface PlaylistEntry {
    channel: string;
    url: string;
}

/**
 * Fetches the raw markup of one search result page.
 * Rejects on timeout, transport error or non-success status.
 */
export type SearchFetcher = (channel: string, page: number) => Promise<string>;

export interface HarvestOutcome {
    /** Candidates extracted across all pages, duplicates included */
    discovered: number;
    /** Distinct urls after merging */
    unique: number;
    /** Entries that passed validation and were written */
    valid: number;
    outputPath: string;
    /** Written entries per channel */
    perChannel: Record<string, number>;
}
