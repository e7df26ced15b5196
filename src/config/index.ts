/**
 * Configuration module with Zod schema validation
 * Fail-fast with actionable error messages
 */
import { z } from 'zod';

// Custom validators
const urlSchema = z.string().url('Must be a valid URL');
const positiveIntSchema = z.coerce.number().int().positive();
const nonNegativeIntSchema = z.coerce.number().int().min(0);
const booleanSchema = z
    .enum(['true', 'false', '1', '0'])
    .transform(value => value === 'true' || value === '1');
const listSchema = z
    .string()
    .transform(s => s.split(',').map(item => item.trim()).filter(item => item.length > 0));

// Configuration schema
const configSchema = z.object({
    // Search endpoint
    searchBaseUrl: urlSchema.default('https://tonkiang.us/'),
    searchKeywordParam: z.string().min(1).default('iptv'),
    searchTokenParam: z.string().min(1).default('l'),
    searchUserAgent: z.string().min(1).default(
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36'
    ),
    searchAcceptLanguage: z.string().min(1).default('zh-CN,zh;q=0.8,en-US;q=0.5,en;q=0.3'),
    searchTimeoutMs: positiveIntSchema.default(15000),

    // Channels
    channels: listSchema.nullable().default(null),
    channelsPath: z.string().min(1).nullable().default(null),

    // Discovery
    pagesPerChannel: positiveIntSchema.default(4),
    pacingMs: nonNegativeIntSchema.default(1000),
    channelConcurrency: positiveIntSchema.default(3),
    pageConcurrency: positiveIntSchema.default(2),
    stopOnEmptyPage: booleanSchema.default('true'),
    linkExtension: z.string().regex(/^[a-z0-9]+$/i, 'Must be a bare file extension').default('m3u8'),

    // Validation
    validateConcurrency: positiveIntSchema.default(10),
    probeTimeoutMs: positiveIntSchema.default(5000),
    probeBytes: positiveIntSchema.max(65536).default(512),

    // Output
    outputDir: z.string().min(1).default('output'),
    outputFile: z.string().min(1).default('playlist.m3u'),
    groupTitle: z.string().default('CCTV'),

    // Logging & Metrics
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    metricsFile: z.string().nullable().default(null),

    // CI reporting
    githubActions: booleanSchema.default('false'),
    githubOutput: z.string().nullable().default(null),
});

export type Config = z.infer<typeof configSchema>;

export class ConfigError extends Error {
    constructor(public readonly problems: string[]) {
        super(`Invalid configuration:\n${problems.join('\n')}`);
        this.name = 'ConfigError';
    }
}

/**
 * Map environment variables to config object
 */
function mapEnvToConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
    return {
        searchBaseUrl: env.SEARCH_BASE_URL,
        searchKeywordParam: env.SEARCH_KEYWORD_PARAM,
        searchTokenParam: env.SEARCH_TOKEN_PARAM,
        searchUserAgent: env.SEARCH_USER_AGENT,
        searchAcceptLanguage: env.SEARCH_ACCEPT_LANGUAGE,
        searchTimeoutMs: env.SEARCH_TIMEOUT_MS,

        channels: env.CHANNELS || null,
        channelsPath: env.CHANNELS_PATH || null,

        pagesPerChannel: env.PAGES_PER_CHANNEL,
        pacingMs: env.PACING_MS,
        channelConcurrency: env.CHANNEL_CONCURRENCY,
        pageConcurrency: env.PAGE_CONCURRENCY,
        stopOnEmptyPage: env.STOP_ON_EMPTY_PAGE,
        linkExtension: env.LINK_EXTENSION,

        validateConcurrency: env.VALIDATE_CONCURRENCY,
        probeTimeoutMs: env.PROBE_TIMEOUT_MS,
        probeBytes: env.PROBE_BYTES,

        outputDir: env.OUTPUT_DIR,
        outputFile: env.OUTPUT_FILE,
        groupTitle: env.GROUP_TITLE,

        logLevel: env.LOG_LEVEL,
        metricsFile: env.METRICS_FILE || null,

        githubActions: env.GITHUB_ACTIONS,
        githubOutput: env.GITHUB_OUTPUT || null,
    };
}

/**
 * Convert config path to environment variable name
 */
function pathToEnvVar(path: string): string {
    return path
        .replace(/([A-Z])/g, '_$1')
        .toUpperCase()
        .replace(/^_/, '');
}

/**
 * Validate an environment against the schema
 * @throws ConfigError listing every missing or invalid variable
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
    const result = configSchema.safeParse(mapEnvToConfig(env));

    if (!result.success) {
        const problems = result.error.issues.map(issue => {
            const envVar = pathToEnvVar(issue.path.join('.'));
            return `  - ${envVar}: ${issue.message}`;
        });
        throw new ConfigError(problems);
    }

    return result.data;
}

/**
 * Load and validate configuration
 * Fails fast with clear error messages
 */
function loadConfig(): Config {
    try {
        return parseConfig(process.env);
    } catch (error) {
        if (!(error instanceof ConfigError)) {
            throw error;
        }

        console.error('\n❌ Configuration Error\n');
        console.error('The following environment variables are missing or invalid:\n');
        console.error(error.problems.join('\n'));
        console.error('\nSee .env.example for supported configuration.\n');

        process.exit(1);
    }
}

/**
 * Redact values that should not end up in logs
 */
export function getRedactedConfig(cfg: Config): Record<string, unknown> {
    return {
        searchBaseUrl: cfg.searchBaseUrl,
        channels: cfg.channelsPath ? `[file: ${cfg.channelsPath}]` : cfg.channels ?? '[bundled]',
        pagesPerChannel: cfg.pagesPerChannel,
        pacingMs: cfg.pacingMs,
        channelConcurrency: cfg.channelConcurrency,
        pageConcurrency: cfg.pageConcurrency,
        validateConcurrency: cfg.validateConcurrency,
        searchTimeoutMs: cfg.searchTimeoutMs,
        probeTimeoutMs: cfg.probeTimeoutMs,
        stopOnEmptyPage: cfg.stopOnEmptyPage,
        outputDir: cfg.outputDir,
        outputFile: cfg.outputFile,
        logLevel: cfg.logLevel,
        metricsFile: cfg.metricsFile,
        githubOutput: cfg.githubOutput ? '[CONFIGURED]' : null,
    };
}

// Export singleton config
export const config = loadConfig();
