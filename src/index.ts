#!/usr/bin/env node
/**
 * Playlist Harvester - Main entry point
 *
 * Single run:
 * - Searches every configured channel for stream links
 * - Probes each distinct link and keeps the live ones
 * - Writes a channel-sorted extended M3U playlist
 *
 * Exits non-zero when no valid link is found.
 */
import { join } from 'path';
import { config, getRedactedConfig } from './config/index.js';
import { resolveChannels } from './config/channels.js';
import { logger } from './observability/logger.js';
import { writeMetricsFile } from './observability/metrics.js';
import { installCrashHandlers } from './observability/process-handlers.js';
import { EmptyPlaylistError, runHarvest } from './pipeline.js';
import { writeRunReport } from './reporting/run-report.js';
import { createSearchClient } from './search/search.client.js';
import { createSessionTokenGenerator } from './search/session-token.js';
import { createValidator } from './services/validator.service.js';

async function flushMetrics(): Promise<void> {
    if (!config.metricsFile) {
        return;
    }
    try {
        await writeMetricsFile(config.metricsFile);
    } catch (error) {
        logger.warn('Failed to write metrics file', {
            path: config.metricsFile,
            error: error instanceof Error ? error.message : String(error),
        });
    }
}

async function main(): Promise<number> {
    logger.info('Starting Playlist Harvester...', { startedAt: new Date().toISOString() });
    logger.info('Configuration loaded', getRedactedConfig(config));

    const channels = await resolveChannels(config);

    const fetchPage = createSearchClient({
        baseUrl: config.searchBaseUrl,
        keywordParam: config.searchKeywordParam,
        tokenParam: config.searchTokenParam,
        timeoutMs: config.searchTimeoutMs,
        userAgent: config.searchUserAgent,
        acceptLanguage: config.searchAcceptLanguage,
        generateToken: createSessionTokenGenerator(),
    });

    const validator = createValidator({
        timeoutMs: config.probeTimeoutMs,
        probeBytes: config.probeBytes,
        concurrency: config.validateConcurrency,
        userAgent: config.searchUserAgent,
    });

    try {
        const outcome = await runHarvest(
            {
                channels,
                discovery: {
                    pagesPerChannel: config.pagesPerChannel,
                    pacingMs: config.pacingMs,
                    channelConcurrency: config.channelConcurrency,
                    pageConcurrency: config.pageConcurrency,
                    stopOnEmptyPage: config.stopOnEmptyPage,
                    extension: config.linkExtension,
                },
                outputPath: join(config.outputDir, config.outputFile),
                groupTitle: config.groupTitle,
            },
            { fetchPage, validator }
        );

        logger.info('✅ Harvest finished', {
            outputFile: outcome.outputPath,
            discovered: outcome.discovered,
            unique: outcome.unique,
            valid: outcome.valid,
        });

        await writeRunReport(outcome, config);
        return 0;
    } catch (error) {
        if (error instanceof EmptyPlaylistError) {
            logger.error('❌ Harvest produced no valid links', error, {
                discovered: error.discovered,
                unique: error.unique,
            });
            return 1;
        }
        throw error;
    } finally {
        await flushMetrics();
    }
}

// Handle uncaught errors
installCrashHandlers();

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error) => {
        logger.error('Harvest failed', error);
        process.exit(1);
    });
