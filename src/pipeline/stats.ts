/**
 * Derived stat counters
 */
import type { Dataset } from '../dataset/types.js';

export interface DerivedStats {
    tvEpisodes: number;
    mediaExposure: number;
}

/**
 * tv_episodes = |tv_shows|; media_exposure = tv_episodes + |news_media| + |health_media|
 */
export function recalculateStats(dataset: Dataset): DerivedStats {
    const tvEpisodes = dataset.tv_shows.length;
    const mediaExposure = tvEpisodes + dataset.news_media.length + dataset.health_media.length;

    dataset.stats.tv_episodes.count = tvEpisodes;
    dataset.stats.tv_episodes.display = `${tvEpisodes}+`;
    dataset.stats.media_exposure.count = mediaExposure;
    dataset.stats.media_exposure.display = `${mediaExposure}+`;

    return { tvEpisodes, mediaExposure };
}
