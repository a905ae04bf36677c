/**
 * Configuration module with Zod schema validation
 * Fail-fast with actionable error messages
 */
import { z } from 'zod';

const positiveIntSchema = z.coerce.number().int().positive();

const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

// Configuration schema
const configSchema = z.object({
    // Persistence
    dataFile: z.string().min(1).default('data.json'),
    mediaRegistryPath: z.string().min(1).default('config/media-registry.json'),

    // Logging
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    // Fixed local time zone, minutes east of UTC (UTC+8)
    utcOffsetMinutes: z.coerce.number().int().min(-720).max(840).default(480),

    // Timeouts
    httpTimeoutMs: positiveIntSchema.default(15000),
    redirectTimeoutMs: positiveIntSchema.default(10000),
    browserTimeoutMs: positiveIntSchema.default(30000),
    browserSettleMs: z.coerce.number().int().min(0).default(3000),
    ytdlpTimeoutMs: positiveIntSchema.default(30000),

    // Discovery limits
    feedEntryLimit: positiveIntSchema.default(15),
    videoResultLimit: positiveIntSchema.default(5),
    followerMinCount: z.coerce.number().int().min(0).default(1000),

    // External tools
    ytdlpBin: z.string().min(1).default('yt-dlp'),
    pythonBin: z.string().min(1).default('python3'),
    chromiumExecutablePath: z.string().nullable().default(null),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Map environment variables to config object
 */
function mapEnvToConfig(): Record<string, unknown> {
    return {
        dataFile: process.env.DATA_FILE,
        mediaRegistryPath: process.env.MEDIA_REGISTRY_PATH,

        logLevel: process.env.LOG_LEVEL,
        utcOffsetMinutes: process.env.UTC_OFFSET_MINUTES,

        httpTimeoutMs: process.env.HTTP_TIMEOUT_MS,
        redirectTimeoutMs: process.env.REDIRECT_TIMEOUT_MS,
        browserTimeoutMs: process.env.BROWSER_TIMEOUT_MS,
        browserSettleMs: process.env.BROWSER_SETTLE_MS,
        ytdlpTimeoutMs: process.env.YTDLP_TIMEOUT_MS,

        feedEntryLimit: process.env.FEED_ENTRY_LIMIT,
        videoResultLimit: process.env.VIDEO_RESULT_LIMIT,
        followerMinCount: process.env.FOLLOWER_MIN_COUNT,

        ytdlpBin: process.env.YTDLP_BIN,
        pythonBin: process.env.PYTHON_BIN,
        chromiumExecutablePath: process.env.CHROMIUM_EXECUTABLE_PATH || null,
        userAgent: process.env.USER_AGENT,
    };
}

/**
 * Load and validate configuration
 * Fails fast with clear error messages
 */
function loadConfig(): Config {
    const rawConfig = mapEnvToConfig();

    const result = configSchema.safeParse(rawConfig);

    if (!result.success) {
        const errors = result.error.issues.map(issue => {
            const path = issue.path.join('.');
            const envVar = pathToEnvVar(path);
            return `  - ${envVar}: ${issue.message}`;
        });

        console.error('\n❌ Configuration Error\n');
        console.error('The following environment variables are invalid:\n');
        console.error(errors.join('\n'));
        console.error('\nSee .env.example for available configuration.\n');

        process.exit(1);
    }

    return result.data;
}

/**
 * Convert config path to environment variable name
 */
export function pathToEnvVar(path: string): string {
    return path
        .replace(/([A-Z])/g, '_$1')
        .toUpperCase()
        .replace(/^_/, '');
}

// Export singleton config
export const config = loadConfig();
