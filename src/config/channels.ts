/**
 * Channel list resolution
 * CHANNELS_PATH wins over CHANNELS; the bundled list is the fallback
 */
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError, type Config } from './index.js';
import { logger } from '../observability/logger.js';

/**
 * Nearest directory above `start` holding a package.json.
 * Resolves the same root from `src/` and from the compiled `dist/src/`.
 */
function findPackageRoot(start: string): string {
    let dir = start;
    while (!existsSync(join(dir, 'package.json'))) {
        const parent = dirname(dir);
        if (parent === dir) {
            return start;
        }
        dir = parent;
    }
    return dir;
}

export const DEFAULT_CHANNELS_PATH = join(
    findPackageRoot(dirname(fileURLToPath(import.meta.url))),
    'config',
    'channels.json'
);

const channelsFileSchema = z.object({
    channels: z.array(z.string().trim().min(1)).min(1, 'Expected at least one channel'),
});

/**
 * Read a `{ "channels": [] }` file
 */
export async function loadChannelsFile(path: string, source = 'CHANNELS_PATH'): Promise<string[]> {
    let raw: unknown;
    try {
        raw = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError([`  - ${source}: cannot read ${path} (${reason})`]);
    }

    const result = channelsFileSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(
            result.error.issues.map(issue => `  - ${source}: ${issue.path.join('.')} ${issue.message}`)
        );
    }

    return result.data.channels;
}

/**
 * Resolve the ordered, duplicate-free channel list for a run
 */
export async function resolveChannels(cfg: Pick<Config, 'channels' | 'channelsPath'>): Promise<string[]> {
    let channels: string[];

    if (cfg.channelsPath) {
        channels = await loadChannelsFile(cfg.channelsPath);
        logger.info('Loaded channels from file', { path: cfg.channelsPath, count: channels.length });
    } else if (cfg.channels && cfg.channels.length > 0) {
        channels = cfg.channels;
        logger.debug('Using channels from CHANNELS', { count: channels.length });
    } else {
        channels = await loadChannelsFile(DEFAULT_CHANNELS_PATH, 'bundled channel list');
        logger.info('Loaded bundled channel list', { path: DEFAULT_CHANNELS_PATH, count: channels.length });
    }

    return Array.from(new Set(channels));
}
