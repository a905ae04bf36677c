/**
 * Appearance Discoverer
 * Searches the video platform for each known TV show and records new episodes
 */
import { CommandTimeoutError } from '../errors.js';
import { createLogger } from '../observability/logger.js';
import { buildExistingUrlIndex, makeId } from '../services/dedup.service.js';
import { AUTO_SOURCE, type Appearance, type Dataset } from '../dataset/types.js';
import type { MediaRegistry } from '../config/registry.js';
import type { Clock } from '../services/clock.js';
import type { StageResult, VideoResult, VideoSearch } from '../fetchers/types.js';

const log = createLogger({ stage: 'tv' });

export interface AppearanceDiscovererDeps {
    videoSearch: VideoSearch;
    registry: MediaRegistry;
    clock: Clock;
    resultLimit: number;
}

export function shortVideoUrl(videoId: string): string {
    return `https://youtu.be/${videoId}`;
}

/**
 * "20240131" -> "2024-01-31"; anything else -> ''
 */
export function parseUploadDate(uploadDate: string | undefined): string {
    if (!uploadDate || !/^\d{8}$/.test(uploadDate)) {
        return '';
    }
    return `${uploadDate.substring(0, 4)}-${uploadDate.substring(4, 6)}-${uploadDate.substring(6, 8)}`;
}

function toAppearance(
    video: VideoResult,
    showName: string,
    network: string,
    today: string
): Appearance {
    return {
        id: makeId('tv', showName, video.title),
        show: showName,
        show_network: network,
        title: video.title,
        date: parseUploadDate(video.uploadDate),
        url: shortVideoUrl(video.id),
        source: AUTO_SOURCE,
        added_date: today,
    };
}

export async function discoverAppearances(dataset: Dataset, deps: AppearanceDiscovererDeps): Promise<StageResult> {
    log.info('Searching video platform for TV appearances');

    if (!(await deps.videoSearch.ensureAvailable())) {
        log.warn('Video search tool unavailable, skipping TV search');
        return { status: 'failed', reason: 'video search tool unavailable' };
    }

    const existing = buildExistingUrlIndex(dataset);
    const primaryName = deps.registry.searchNames[0];
    let added = 0;

    for (const [showName, show] of Object.entries(deps.registry.tvShows)) {
        const query = `${showName} ${primaryName}`;
        const queryLog = log.child({ query });
        const relevantTerms = [...deps.registry.searchNames, showName];

        try {
            const videos = await deps.videoSearch.search(query, deps.resultLimit);

            for (const video of videos) {
                const url = shortVideoUrl(video.id);
                if (existing.has(video.id) || existing.has(url)) {
                    continue;
                }
                if (!relevantTerms.some(term => video.title.includes(term))) {
                    continue;
                }

                const appearance = toAppearance(video, showName, show.network, deps.clock.today());
                dataset.tv_shows.push(appearance);
                existing.add(video.id);
                existing.add(url);
                added++;

                queryLog.info(`[+] [${showName}] ${video.title.substring(0, 60)}`, { url });
            }
        } catch (error) {
            if (error instanceof CommandTimeoutError) {
                queryLog.warn('Timeout searching for query', { timeoutMs: error.timeoutMs });
            } else {
                queryLog.error('Error searching for query', error);
            }
        }
    }

    log.info('TV search finished', { added });

    if (added > 0) {
        return { status: 'changed', added, summary: `${added} new TV appearances` };
    }
    return { status: 'unchanged', reason: 'no new TV appearances' };
}
