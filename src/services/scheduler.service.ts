/**
 * Discovery scheduler
 * Fans out (channel, page) search tasks over two bounded pools:
 * channels in parallel, and each channel's pages in parallel.
 */
import pLimit from 'p-limit';
import { extractLinks } from '../extract/link-extractor.js';
import { createLogger, logger } from '../observability/logger.js';
import { candidatesDiscovered, searchPagesTotal } from '../observability/metrics.js';
import type { Candidate, SearchFetcher, Task } from '../types.js';

export interface DiscoveryOptions {
    pagesPerChannel: number;
    /** Minimum gap between the starts of two page fetches of one channel */
    pacingMs: number;
    channelConcurrency: number;
    pageConcurrency: number;
    /** Stop a channel at its first page without candidates */
    stopOnEmptyPage: boolean;
    extension?: string;
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
}

export interface DiscoveryResult {
    /** In task order: channel input order, then page ascending */
    candidates: Candidate[];
    pagesFetched: number;
    pagesFailed: number;
    pagesSkipped: number;
}

type PageStatus = 'ok' | 'empty' | 'failed' | 'skipped';

interface PageOutcome {
    page: number;
    status: PageStatus;
    candidates: Candidate[];
}

interface ChannelStats {
    fetched: number;
    failed: number;
    skipped: number;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Enumerate pages 1..pagesPerChannel for every channel
 */
export function buildTasks(channels: readonly string[], pagesPerChannel: number): Task[] {
    const tasks: Task[] = [];
    for (const channel of channels) {
        for (let page = 1; page <= pagesPerChannel; page++) {
            tasks.push({ channel, page });
        }
    }
    return tasks;
}

async function discoverChannel(
    channel: string,
    tasks: Task[],
    fetchPage: SearchFetcher,
    options: DiscoveryOptions,
    stats: ChannelStats
): Promise<Candidate[]> {
    const sleep = options.sleep ?? defaultSleep;
    const now = options.now ?? Date.now;
    const limit = pLimit(options.pageConcurrency);
    const log = createLogger({ channel, stage: 'search' });

    let exhaustedAt = Number.POSITIVE_INFINITY;
    let nextStartAt = 0;

    const skip = (task: Task): PageOutcome => {
        log.debug('Skipping page after exhausted results', { page: task.page, exhaustedAt });
        return { page: task.page, status: 'skipped', candidates: [] };
    };

    const runTask = async (task: Task): Promise<PageOutcome> => {
        if (task.page > exhaustedAt) {
            return skip(task);
        }

        // Reserve a start slot; the first page never waits
        const current = now();
        const startAt = task.page === 1 ? current : Math.max(current, nextStartAt);
        nextStartAt = startAt + options.pacingMs;
        if (startAt > current) {
            await sleep(startAt - current);
            if (task.page > exhaustedAt) {
                return skip(task);
            }
        }

        let html: string;
        try {
            html = await fetchPage(task.channel, task.page);
        } catch (error) {
            log.warn('Search page failed, continuing with the next page', {
                page: task.page,
                error: error instanceof Error ? error.message : String(error),
            });
            return { page: task.page, status: 'failed', candidates: [] };
        }

        const candidates = extractLinks(html, task.channel, { extension: options.extension });
        if (candidates.length === 0) {
            // Only a page that answered with no results ends the channel
            if (options.stopOnEmptyPage) {
                exhaustedAt = Math.min(exhaustedAt, task.page);
            }
            return { page: task.page, status: 'empty', candidates };
        }

        log.debug('Extracted links from page', { page: task.page, count: candidates.length });
        return { page: task.page, status: 'ok', candidates };
    };

    const outcomes = await Promise.all(tasks.map(task => limit(() => runTask(task))));

    const found: Candidate[] = [];
    for (const outcome of outcomes) {
        // Pages past the exhaustion point may have completed while in flight
        const discarded = outcome.page > exhaustedAt && outcome.status !== 'failed';
        const status: PageStatus = discarded ? 'skipped' : outcome.status;

        searchPagesTotal.inc({ status });
        if (status === 'skipped') {
            stats.skipped++;
        } else if (status === 'failed') {
            stats.failed++;
        } else {
            stats.fetched++;
        }

        if (status === 'ok') {
            candidatesDiscovered.inc({ channel }, outcome.candidates.length);
            found.push(...outcome.candidates);
        }
    }

    return found;
}

/**
 * Run discovery for all channels.
 * A failed page yields no candidates; it never aborts its channel or the run.
 */
export async function runDiscovery(
    channels: readonly string[],
    fetchPage: SearchFetcher,
    options: DiscoveryOptions
): Promise<DiscoveryResult> {
    const limit = pLimit(options.channelConcurrency);
    const stats: ChannelStats = { fetched: 0, failed: 0, skipped: 0 };

    logger.info('Starting discovery', {
        channels: channels.length,
        pagesPerChannel: options.pagesPerChannel,
        channelConcurrency: options.channelConcurrency,
        pageConcurrency: options.pageConcurrency,
    });

    const perChannel = await Promise.all(
        channels.map(channel => limit(async () => {
            const found = await discoverChannel(
                channel,
                buildTasks([channel], options.pagesPerChannel),
                fetchPage,
                options,
                stats
            );
            logger.info(
                found.length > 0 ? `Found ${found.length} links for ${channel}` : `No links found for ${channel}`,
                { channel, count: found.length }
            );
            return found;
        }))
    );

    return {
        candidates: perChannel.flat(),
        pagesFetched: stats.fetched,
        pagesFailed: stats.failed,
        pagesSkipped: stats.skipped,
    };
}
