/**
 * Rating Fetcher
 * Scrapes the clinic's review rating from a search results page
 */
import { errorMessage } from '../errors.js';
import { createLogger } from '../observability/logger.js';
import type { MediaRegistry } from '../config/registry.js';
import type { Dataset } from '../dataset/types.js';
import type { StageResult, TextFetcher } from './types.js';

const log = createLogger({ stage: 'rating' });

// Ratings appear as "4.9 顆星", in embedded JSON, or before the review count
export const RATING_PATTERNS: readonly RegExp[] = [
    /(\d\.\d)\s*顆星/,
    /rating["\s:]+(\d\.\d)/,
    /(\d\.\d)<\/span>\s*<span[^>]*>\s*\(\d/,
];

export const MIN_RATING = 1.0;
export const MAX_RATING = 5.0;

export function buildRatingSearchUrl(registry: MediaRegistry): string {
    return `https://www.google.com/search?q=${encodeURIComponent(registry.ratingQuery)}+${encodeURIComponent('評價')}&hl=${registry.locale}`;
}

/**
 * First pattern match within the valid rating range
 */
export function extractRating(html: string): number | null {
    for (const pattern of RATING_PATTERNS) {
        const match = html.match(pattern);
        if (!match) {
            continue;
        }
        const rating = parseFloat(match[1]);
        if (rating >= MIN_RATING && rating <= MAX_RATING) {
            return rating;
        }
    }
    return null;
}

export interface RatingFetcherDeps {
    fetcher: TextFetcher;
    registry: MediaRegistry;
    userAgent: string;
}

export async function updateRating(dataset: Dataset, deps: RatingFetcherDeps): Promise<StageResult> {
    const url = buildRatingSearchUrl(deps.registry);
    log.info('Fetching rating', { query: deps.registry.ratingQuery });

    try {
        const html = await deps.fetcher.fetchText(url, {
            'User-Agent': deps.userAgent,
            'Accept-Language': `${deps.registry.locale},zh;q=0.9`,
        });
        const rating = extractRating(html);

        if (rating === null) {
            log.warn('Could not extract rating from search results');
            return { status: 'unchanged', reason: 'no rating found' };
        }

        const stat = dataset.stats.google_rating;
        const previous = stat.score;
        stat.score = rating;

        log.info('Rating updated', { previous, rating });
        return { status: 'changed', added: 0, summary: `rating ${previous} -> ${rating}` };
    } catch (error) {
        log.error('Failed to fetch rating', error);
        return { status: 'failed', reason: errorMessage(error) };
    }
}
