/**
 * RSS feed reader backed by rss-parser
 */
import Parser from 'rss-parser';
import type { FeedEntry, FeedReader } from './types.js';

export interface RssReaderOptions {
    timeoutMs: number;
    userAgent: string;
}

export function createRssReader(options: RssReaderOptions): FeedReader {
    const parser = new Parser({
        timeout: options.timeoutMs,
        headers: {
            'User-Agent': options.userAgent,
            'Accept': 'application/rss+xml, application/xml, text/xml, */*',
        },
    });

    return {
        async parse(feedUrl: string): Promise<FeedEntry[]> {
            const feed = await parser.parseURL(feedUrl);
            return (feed.items || []).map((item): FeedEntry => ({
                title: item.title || '',
                link: item.link || '',
                published: item.isoDate || undefined,
            }));
        },
    };
}
