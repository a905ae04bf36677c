/**
 * Redirect resolution for feed links
 */
import { logger } from '../observability/logger.js';

const ARTICLE_PATH_MARKERS = ['.html', '.htm', '/article/', '/news/'];

/**
 * Drop the query string from URLs whose path already identifies an article
 */
export function stripTrackingParams(url: string): string {
    const queryStart = url.indexOf('?');
    if (queryStart === -1) {
        return url;
    }
    const base = url.substring(0, queryStart);
    return ARTICLE_PATH_MARKERS.some(marker => base.includes(marker)) ? base : url;
}

/**
 * Follow redirects with a HEAD request.
 * Returns null when resolution fails; callers fall back to the original link.
 */
export async function resolveArticleUrl(
    url: string,
    options: { timeoutMs: number; userAgent?: string }
): Promise<string | null> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
    try {
        const response = await fetch(url, {
            method: 'HEAD',
            redirect: 'follow',
            signal: controller.signal,
            headers: options.userAgent ? { 'User-Agent': options.userAgent } : undefined,
        });
        return stripTrackingParams(response.url || url);
    } catch (error) {
        if (error instanceof Error && error.name === 'AbortError') {
            logger.debug('Redirect resolution timeout', { url });
        } else {
            logger.debug('Redirect resolution failed', {
                url,
                error: error instanceof Error ? error.message : 'Unknown error',
            });
        }
        return null;
    } finally {
        clearTimeout(timeoutId);
    }
}
