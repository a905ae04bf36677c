/**
 * Deduplication helpers
 * Builds the existing-URL index and deterministic record ids
 */
import { createHash } from 'crypto';
import { RECORD_SECTIONS, type Dataset } from '../dataset/types.js';

/**
 * Extract the platform-native video id from a short link
 * (youtu.be/<id>) or a canonical watch link (youtube.com/watch?v=<id>)
 */
export function extractVideoId(url: string): string | null {
    if (url.includes('youtu.be/')) {
        const id = url.split('youtu.be/').pop()?.split('?')[0] ?? '';
        return id || null;
    }
    if (url.includes('youtube.com/watch')) {
        const id = url.split('v=').pop()?.split('&')[0] ?? '';
        return id || null;
    }
    return null;
}

/**
 * Every stored URL plus the video id behind any video link.
 * Rebuilt from the dataset so records added earlier in the run are included.
 */
export function buildExistingUrlIndex(dataset: Dataset): Set<string> {
    const index = new Set<string>();

    for (const section of RECORD_SECTIONS) {
        for (const item of dataset[section]) {
            const url = item.url;
            if (typeof url !== 'string' || !url) {
                continue;
            }
            const videoId = extractVideoId(url);
            if (videoId) {
                index.add(videoId);
            }
            index.add(url);
        }
    }

    return index;
}

/**
 * Short fingerprint id: "<tag>-<first 8 hex of md5(tag|outlet|title)>".
 * Collisions are tolerated; URL matching is what prevents duplicates.
 */
export function makeId(tag: string, outlet: string, title: string): string {
    const hash = createHash('md5').update(`${tag}|${outlet}|${title}`).digest('hex').substring(0, 8);
    return `${tag}-${hash}`;
}
