/**
 * Configuration Tests
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

vi.mock('../../src/observability/logger.js', () => ({
    logger: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    },
}));

import { ConfigError, getRedactedConfig, parseConfig } from '../../src/config/index.js';
import { DEFAULT_CHANNELS_PATH, loadChannelsFile, resolveChannels } from '../../src/config/channels.js';

function problemsOf(env: NodeJS.ProcessEnv): string[] {
    try {
        parseConfig(env);
    } catch (error) {
        if (error instanceof ConfigError) {
            return error.problems;
        }
        throw error;
    }
    return [];
}

describe('Configuration', () => {
    describe('parseConfig', () => {
        it('should apply defaults for an empty environment', () => {
            const cfg = parseConfig({});

            expect(cfg.searchBaseUrl).toBe('https://tonkiang.us/');
            expect(cfg.pagesPerChannel).toBe(4);
            expect(cfg.pacingMs).toBe(1000);
            expect(cfg.channelConcurrency).toBe(3);
            expect(cfg.pageConcurrency).toBe(2);
            expect(cfg.validateConcurrency).toBe(10);
            expect(cfg.probeTimeoutMs).toBe(5000);
            expect(cfg.stopOnEmptyPage).toBe(true);
            expect(cfg.channels).toBeNull();
            expect(cfg.channelsPath).toBeNull();
            expect(cfg.linkExtension).toBe('m3u8');
            expect(cfg.outputFile).toBe('playlist.m3u');
            expect(cfg.githubActions).toBe(false);
            expect(cfg.githubOutput).toBeNull();
        });

        it('should split and trim the channel list', () => {
            const cfg = parseConfig({ CHANNELS: 'CCTV1, CCTV5 ,,CCTV13' });

            expect(cfg.channels).toEqual(['CCTV1', 'CCTV5', 'CCTV13']);
        });

        it('should coerce numbers and booleans', () => {
            const cfg = parseConfig({
                PAGES_PER_CHANNEL: '2',
                PACING_MS: '0',
                STOP_ON_EMPTY_PAGE: 'false',
                GITHUB_ACTIONS: 'true',
                GITHUB_OUTPUT: '/tmp/step-output',
            });

            expect(cfg.pagesPerChannel).toBe(2);
            expect(cfg.pacingMs).toBe(0);
            expect(cfg.stopOnEmptyPage).toBe(false);
            expect(cfg.githubActions).toBe(true);
            expect(cfg.githubOutput).toBe('/tmp/step-output');
        });

        it('should name every invalid variable', () => {
            const problems = problemsOf({
                PAGES_PER_CHANNEL: '0',
                SEARCH_BASE_URL: 'not a url',
                STOP_ON_EMPTY_PAGE: 'maybe',
            });

            expect(problems).toHaveLength(3);
            expect(problems.some(p => p.startsWith('  - PAGES_PER_CHANNEL:'))).toBe(true);
            expect(problems.some(p => p.startsWith('  - SEARCH_BASE_URL:'))).toBe(true);
            expect(problems.some(p => p.startsWith('  - STOP_ON_EMPTY_PAGE:'))).toBe(true);
        });

        it('should reject an extension with a dot', () => {
            expect(problemsOf({ LINK_EXTENSION: '.m3u8' })).toEqual(['  - LINK_EXTENSION: Must be a bare file extension']);
        });
    });

    describe('getRedactedConfig', () => {
        it('should not expose the step output path', () => {
            const cfg = parseConfig({ GITHUB_OUTPUT: '/tmp/step-output' });

            expect(getRedactedConfig(cfg).githubOutput).toBe('[CONFIGURED]');
        });
    });

    describe('channels', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await mkdtemp(join(tmpdir(), 'channels-'));
        });

        afterEach(async () => {
            await rm(dir, { recursive: true, force: true });
        });

        it('should use CHANNELS and drop repeats when no file is set', async () => {
            const channels = await resolveChannels({ channels: ['A', 'B', 'A'], channelsPath: null });

            expect(channels).toEqual(['A', 'B']);
        });

        it('should prefer the channels file over CHANNELS', async () => {
            const path = join(dir, 'channels.json');
            await writeFile(path, JSON.stringify({ channels: ['X', 'Y'] }), 'utf-8');

            expect(await resolveChannels({ channels: ['A'], channelsPath: path })).toEqual(['X', 'Y']);
        });

        it('should fall back to the bundled list', async () => {
            const channels = await resolveChannels({ channels: null, channelsPath: null });

            expect(channels).toHaveLength(17);
            expect(channels[16]).toBe('CCTV17');
        });

        it('should find the bundled list from any working directory', async () => {
            const cwd = process.cwd();
            process.chdir(dir);
            try {
                const channels = await resolveChannels({ channels: null, channelsPath: null });

                expect(channels).toHaveLength(17);
                expect(channels[0]).toBe('CCTV1');
            } finally {
                process.chdir(cwd);
            }
        });

        it('should resolve the bundled list beside the package', () => {
            expect(DEFAULT_CHANNELS_PATH).toBe(join(process.cwd(), 'config', 'channels.json'));
        });

        it('should name the bundled list when it cannot be read', async () => {
            await expect(
                loadChannelsFile(join(dir, 'missing.json'), 'bundled channel list')
            ).rejects.toThrow(/bundled channel list: cannot read/);
        });

        it('should ship a default channel list', async () => {
            const channels = await loadChannelsFile(join(process.cwd(), 'config', 'channels.json'));

            expect(channels).toHaveLength(17);
            expect(channels[0]).toBe('CCTV1');
        });

        it('should reject an empty channels file', async () => {
            const path = join(dir, 'channels.json');
            await writeFile(path, JSON.stringify({ channels: [] }), 'utf-8');

            await expect(loadChannelsFile(path)).rejects.toBeInstanceOf(ConfigError);
        });

        it('should reject a missing channels file', async () => {
            await expect(loadChannelsFile(join(dir, 'missing.json'))).rejects.toThrow(/CHANNELS_PATH: cannot read/);
        });
    });
});
