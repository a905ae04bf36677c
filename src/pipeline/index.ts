/**
 * Media kit refresh pipeline
 *
 * load -> followers, rating, news, tv -> stats -> save
 *
 * Only a failure to load the dataset aborts the run. Every other stage
 * reports through a StageResult and the dataset is always written back.
 */
import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../observability/logger.js';
import { loadDataset, saveDataset } from '../dataset/store.js';
import { updateFollowerCount } from '../fetchers/followers.fetcher.js';
import { updateRating } from '../fetchers/rating.fetcher.js';
import { discoverArticles } from '../discoverers/article.discoverer.js';
import { discoverAppearances } from '../discoverers/appearance.discoverer.js';
import { recalculateStats, type DerivedStats } from './stats.js';
import { runStage } from './stage.js';
import type { MediaRegistry } from '../config/registry.js';
import type { Clock } from '../services/clock.js';
import type {
    FeedReader,
    PageRenderer,
    StageResult,
    TextFetcher,
    UrlResolver,
    VideoSearch,
} from '../fetchers/types.js';

export interface PipelineSettings {
    dataFile: string;
    userAgent: string;
    followerMinCount: number;
    feedEntryLimit: number;
    videoResultLimit: number;
}

export interface PipelineDeps {
    registry: MediaRegistry;
    clock: Clock;
    renderer: PageRenderer;
    textFetcher: TextFetcher;
    feedReader: FeedReader;
    urlResolver: UrlResolver;
    videoSearch: VideoSearch;
    settings: PipelineSettings;
}

export interface RunSummary {
    runId: string;
    stages: {
        followers: StageResult;
        rating: StageResult;
        news: StageResult;
        tv: StageResult;
    };
    stats: DerivedStats;
    hasChanges: boolean;
    lastUpdated: string;
}

export async function runPipeline(deps: PipelineDeps): Promise<RunSummary> {
    const runId = uuidv4();
    const runLog = createLogger({ runId });
    const { registry, clock, settings } = deps;

    runLog.info('Media kit update started', { startedAt: clock.timestamp(), dataFile: settings.dataFile });

    const dataset = await loadDataset(settings.dataFile);

    const followers = await runStage('followers', () => updateFollowerCount(dataset, {
        renderer: deps.renderer,
        registry,
        minCount: settings.followerMinCount,
    }));

    const rating = await runStage('rating', () => updateRating(dataset, {
        fetcher: deps.textFetcher,
        registry,
        userAgent: settings.userAgent,
    }));

    const news = await runStage('news', () => discoverArticles(dataset, {
        feedReader: deps.feedReader,
        urlResolver: deps.urlResolver,
        registry,
        clock,
        entryLimit: settings.feedEntryLimit,
    }));

    const tv = await runStage('tv', () => discoverAppearances(dataset, {
        videoSearch: deps.videoSearch,
        registry,
        clock,
        resultLimit: settings.videoResultLimit,
    }));

    const stats = recalculateStats(dataset);
    createLogger({ runId, stage: 'stats' }).info('Stats recalculated', { ...stats });

    await saveDataset(settings.dataFile, dataset, clock);

    const stages = { followers, rating, news, tv };
    const hasChanges = Object.values(stages).some(result => result.status === 'changed');

    if (hasChanges) {
        runLog.info('Done: dataset updated with new content', { stages });
    } else {
        runLog.info('Done: no new content found, timestamp updated', { stages });
    }

    return {
        runId,
        stages,
        stats,
        hasChanges,
        lastUpdated: dataset.last_updated ?? clock.timestamp(),
    };
}
