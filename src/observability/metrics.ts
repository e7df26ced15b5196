/**
 * Prometheus metrics for a harvest run
 * Written as a textfile at the end of the run when METRICS_FILE is set
 */
import client from 'prom-client';
import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';

// Create a Registry
export const registry = new client.Registry();

// ============================================================================
// DISCOVERY METRICS
// ============================================================================

/**
 * Counter: Search result pages by outcome
 */
export const searchPagesTotal = new client.Counter({
    name: 'harvest_search_pages_total',
    help: 'Search result pages processed, by outcome',
    labelNames: ['status'] as const, // ok | empty | failed | skipped
    registers: [registry],
});

/**
 * Counter: Link candidates extracted (before dedup)
 */
export const candidatesDiscovered = new client.Counter({
    name: 'harvest_candidates_discovered_total',
    help: 'Link candidates extracted from search pages',
    labelNames: ['channel'] as const,
    registers: [registry],
});

// ============================================================================
// VALIDATION METRICS
// ============================================================================

/**
 * Counter: Probes by result
 */
export const probesTotal = new client.Counter({
    name: 'harvest_probes_total',
    help: 'Stream probes performed, by result',
    labelNames: ['result'] as const, // valid | invalid
    registers: [registry],
});

/**
 * Histogram: Probe duration in seconds
 */
export const probeDuration = new client.Histogram({
    name: 'harvest_probe_duration_seconds',
    help: 'Stream probe duration in seconds',
    buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10],
    registers: [registry],
});

// ============================================================================
// OUTPUT METRICS
// ============================================================================

/**
 * Gauge: Entries in the last written playlist
 */
export const playlistEntries = new client.Gauge({
    name: 'harvest_playlist_entries',
    help: 'Entries written to the playlist by the last run',
    registers: [registry],
});

/**
 * Dump the registry in Prometheus text format
 */
export async function writeMetricsFile(path: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, await registry.metrics(), 'utf-8');
}
