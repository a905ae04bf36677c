/**
 * Media Kit Updater - Main entry point
 *
 * One unattended pass, meant to be run by a scheduler:
 * - refreshes follower count and rating
 * - discovers new news articles and TV appearances
 * - recalculates derived stats and rewrites the dataset file
 *
 * Exits 0 even when a stage fails or the dataset cannot be loaded; the
 * scheduler diffs the dataset file to see whether anything changed.
 */
import { config } from './config/index.js';
import { loadMediaRegistry } from './config/registry.js';
import { logger } from './observability/logger.js';
import { createClock } from './services/clock.js';
import { fetchText } from './services/http.js';
import { resolveArticleUrl } from './services/url-resolver.js';
import { createChromiumRenderer } from './browser/renderer.js';
import { createRssReader } from './fetchers/rss.reader.js';
import { YtDlpSearch } from './media/ytdlp.js';
import { runPipeline } from './pipeline/index.js';
import { abortRun, RUN_EXIT_CODE } from './pipeline/exit.js';

async function main(): Promise<void> {
    logger.info('Configuration loaded', {
        dataFile: config.dataFile,
        mediaRegistryPath: config.mediaRegistryPath,
        logLevel: config.logLevel,
        utcOffsetMinutes: config.utcOffsetMinutes,
        ytdlpBin: config.ytdlpBin,
        chromiumExecutablePath: config.chromiumExecutablePath,
    });

    const registry = await loadMediaRegistry(config.mediaRegistryPath);

    await runPipeline({
        registry,
        clock: createClock(config.utcOffsetMinutes),
        renderer: createChromiumRenderer({
            userAgent: config.userAgent,
            locale: registry.locale,
            timeoutMs: config.browserTimeoutMs,
            settleMs: config.browserSettleMs,
            executablePath: config.chromiumExecutablePath,
        }),
        textFetcher: {
            fetchText: (url, headers) => fetchText(url, { headers, timeoutMs: config.httpTimeoutMs }),
        },
        feedReader: createRssReader({
            timeoutMs: config.httpTimeoutMs,
            userAgent: config.userAgent,
        }),
        urlResolver: {
            resolve: (url) => resolveArticleUrl(url, {
                timeoutMs: config.redirectTimeoutMs,
                userAgent: config.userAgent,
            }),
        },
        videoSearch: new YtDlpSearch({
            bin: config.ytdlpBin,
            pythonBin: config.pythonBin,
            timeoutMs: config.ytdlpTimeoutMs,
        }),
        settings: {
            dataFile: config.dataFile,
            userAgent: config.userAgent,
            followerMinCount: config.followerMinCount,
            feedEntryLimit: config.feedEntryLimit,
            videoResultLimit: config.videoResultLimit,
        },
    });
}

process.on('unhandledRejection', (reason) => {
    abortRun('Unhandled rejection', reason);
});

main()
    .then(() => {
        process.exit(RUN_EXIT_CODE);
    })
    .catch((error) => {
        // Only an unreadable dataset or registry gets here; nothing was written
        abortRun('Media kit update aborted', error);
    });
