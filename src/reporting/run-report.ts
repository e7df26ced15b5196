/**
 * CI step outputs for a finished run
 */
import { appendFile } from 'fs/promises';
import { logger } from '../observability/logger.js';
import type { HarvestOutcome } from '../types.js';

export interface RunReportTarget {
    githubActions: boolean;
    githubOutput: string | null;
}

export function formatStepOutputs(outcome: Pick<HarvestOutcome, 'outputPath' | 'unique' | 'valid'>): string {
    return [
        `output_file=${outcome.outputPath}`,
        `total_links=${outcome.unique}`,
        `valid_links=${outcome.valid}`,
    ].join('\n') + '\n';
}

/**
 * Append step outputs to $GITHUB_OUTPUT when running in GitHub Actions.
 * Returns whether anything was written.
 */
export async function writeRunReport(
    outcome: Pick<HarvestOutcome, 'outputPath' | 'unique' | 'valid'>,
    target: RunReportTarget
): Promise<boolean> {
    if (!target.githubActions || !target.githubOutput) {
        return false;
    }

    await appendFile(target.githubOutput, formatStepOutputs(outcome), 'utf-8');
    logger.debug('Wrote step outputs', { path: target.githubOutput });
    return true;
}
