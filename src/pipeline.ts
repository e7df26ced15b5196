/**
 * Harvest pipeline
 * discovery -> merge (first-seen wins) -> validation -> playlist
 */
import { randomUUID } from 'crypto';
import { createLogger } from './observability/logger.js';
import { playlistEntries } from './observability/metrics.js';
import { mergeCandidates } from './services/dedup.service.js';
import { runDiscovery, type DiscoveryOptions } from './services/scheduler.service.js';
import type { Validator } from './services/validator.service.js';
import { sortEntries, writePlaylist } from './playlist/playlist.writer.js';
import type { HarvestOutcome, PlaylistEntry, SearchFetcher } from './types.js';

export interface HarvestOptions {
    channels: readonly string[];
    discovery: DiscoveryOptions;
    outputPath: string;
    groupTitle: string;
}

export interface HarvestDeps {
    fetchPage: SearchFetcher;
    validator: Validator;
}

/**
 * Raised when no link survives validation; no playlist is written
 */
export class EmptyPlaylistError extends Error {
    constructor(
        public readonly discovered: number,
        public readonly unique: number
    ) {
        super(
            unique === 0
                ? 'No stream links were discovered'
                : `None of ${unique} discovered stream links passed validation`
        );
        this.name = 'EmptyPlaylistError';
    }
}

function countByChannel(entries: readonly PlaylistEntry[]): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const entry of sortEntries(entries)) {
        counts[entry.channel] = (counts[entry.channel] ?? 0) + 1;
    }
    return counts;
}

export async function runHarvest(options: HarvestOptions, deps: HarvestDeps): Promise<HarvestOutcome> {
    const log = createLogger({ runId: randomUUID() });
    const startedAt = Date.now();

    const discovery = await runDiscovery(options.channels, deps.fetchPage, options.discovery);
    log.info('Discovery finished', {
        stage: 'search',
        discovered: discovery.candidates.length,
        pagesFetched: discovery.pagesFetched,
        pagesFailed: discovery.pagesFailed,
        pagesSkipped: discovery.pagesSkipped,
    });

    const unique = mergeCandidates(discovery.candidates);
    log.info(`Found ${unique.length} unique links in total`, { stage: 'dedup', unique: unique.length });

    if (unique.length === 0) {
        throw new EmptyPlaylistError(discovery.candidates.length, 0);
    }

    const results = await deps.validator.validateAll(unique);
    const entries: PlaylistEntry[] = results
        .filter(result => result.valid)
        .map(result => ({ channel: result.candidate.source, url: result.candidate.url }));
    log.info(`${entries.length} of ${unique.length} links passed validation`, {
        stage: 'validate',
        valid: entries.length,
        invalid: unique.length - entries.length,
    });

    if (entries.length === 0) {
        throw new EmptyPlaylistError(discovery.candidates.length, unique.length);
    }

    const written = await writePlaylist(entries, options.outputPath, { groupTitle: options.groupTitle });
    playlistEntries.set(written);

    const perChannel = countByChannel(entries);
    for (const [channel, count] of Object.entries(perChannel)) {
        log.info(`${channel}: ${count} links`, { stage: 'write', channel, count });
    }
    log.info('Harvest complete', { durationMs: Date.now() - startedAt, outputPath: options.outputPath });

    return {
        discovered: discovery.candidates.length,
        unique: unique.length,
        valid: written,
        outputPath: options.outputPath,
        perChannel,
    };
}
