/**
 * Extended M3U playlist writer
 * The target is replaced atomically: write a sibling temp file, then rename.
 */
import { randomUUID } from 'crypto';
import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { createLogger } from '../observability/logger.js';
import type { PlaylistEntry } from '../types.js';

export interface PlaylistOptions {
    /** Value of group-title on every entry */
    groupTitle: string;
}

const log = createLogger({ stage: 'write' });

function compareChannels(a: PlaylistEntry, b: PlaylistEntry): number {
    if (a.channel < b.channel) return -1;
    if (a.channel > b.channel) return 1;
    return 0;
}

/**
 * Stable ascending sort by channel name
 */
export function sortEntries(entries: readonly PlaylistEntry[]): PlaylistEntry[] {
    return [...entries].sort(compareChannels);
}

export function renderPlaylist(entries: readonly PlaylistEntry[], options: PlaylistOptions): string {
    const lines = ['#EXTM3U'];
    for (const entry of sortEntries(entries)) {
        lines.push(
            `#EXTINF:-1 tvg-id="" tvg-name="${entry.channel}" tvg-logo="" group-title="${options.groupTitle}",${entry.channel}`,
            entry.url
        );
    }
    return lines.join('\n') + '\n';
}

/**
 * Replace the playlist at `path`; resolves to the number of entries written
 */
export async function writePlaylist(
    entries: readonly PlaylistEntry[],
    path: string,
    options: PlaylistOptions
): Promise<number> {
    const content = renderPlaylist(entries, options);
    const dir = dirname(path);
    const tempPath = join(dir, `.${basename(path)}.${randomUUID()}.tmp`);

    await mkdir(dir, { recursive: true });
    try {
        await writeFile(tempPath, content, 'utf-8');
        await rename(tempPath, path);
    } catch (error) {
        await rm(tempPath, { force: true });
        throw error;
    }

    log.info(`Saved ${entries.length} valid links to ${path}`, { path, count: entries.length });
    return entries.length;
}
