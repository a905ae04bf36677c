/**
 * Article Discoverer
 * Searches the news feed for each search term and files new articles
 * under health or news media.
 */
import { createLogger } from '../observability/logger.js';
import { buildExistingUrlIndex, makeId } from '../services/dedup.service.js';
import { classifyOutlet, determineCategory, outletRole } from '../services/outlet-classifier.js';
import { AUTO_SOURCE, type Article, type Dataset } from '../dataset/types.js';
import type { MediaRegistry } from '../config/registry.js';
import type { Clock } from '../services/clock.js';
import type { FeedEntry, FeedReader, StageResult, UrlResolver } from '../fetchers/types.js';

const log = createLogger({ stage: 'news' });

export interface ArticleDiscovererDeps {
    feedReader: FeedReader;
    urlResolver: UrlResolver;
    registry: MediaRegistry;
    clock: Clock;
    entryLimit: number;
}

export function buildNewsFeedUrl(term: string, registry: MediaRegistry): string {
    const { baseUrl, hl, gl, ceid } = registry.newsFeed;
    return `${baseUrl}?q=${encodeURIComponent(term)}&hl=${hl}&gl=${gl}&ceid=${ceid}`;
}

/**
 * "Title - Source" -> { title, source }; titles without the suffix pass through
 */
export function splitSourceSuffix(title: string): { title: string; source: string } {
    const separator = title.lastIndexOf(' - ');
    if (separator === -1) {
        return { title, source: '' };
    }
    return {
        title: title.substring(0, separator).trim(),
        source: title.substring(separator + 3).trim(),
    };
}

/**
 * UTC calendar date of the feed's publish timestamp, or '' when absent or invalid
 */
export function publishedDate(published: string | undefined): string {
    if (!published) {
        return '';
    }
    const date = new Date(published);
    return Number.isNaN(date.getTime()) ? '' : date.toISOString().slice(0, 10);
}

export function isRelevant(title: string, terms: readonly string[]): boolean {
    return terms.some(term => title.includes(term));
}

/**
 * Build the article record for a feed entry, or null if it is known or irrelevant
 */
async function processEntry(
    entry: FeedEntry,
    dataset: Dataset,
    existing: Set<string>,
    deps: ArticleDiscovererDeps
): Promise<Article | null> {
    const link = entry.link;
    if (!link || !isRelevant(entry.title, deps.registry.searchNames)) {
        return null;
    }

    // Falls back to the feed link when resolution fails
    const actualUrl = (await deps.urlResolver.resolve(link)) || link;
    if (existing.has(actualUrl) || existing.has(link)) {
        return null;
    }

    const { title, source } = splitSourceSuffix(entry.title);
    const outlet = classifyOutlet(actualUrl, source, deps.registry);
    const category = determineCategory(outlet, deps.registry);
    const role = outletRole(outlet, deps.registry);

    const article: Article = {
        id: makeId(category.substring(0, 2), outlet, title),
        outlet,
        title,
        date: publishedDate(entry.published),
        url: actualUrl,
        source: AUTO_SOURCE,
        added_date: deps.clock.today(),
    };
    if (role) {
        article.outlet_role = role;
    }

    dataset[category].push(article);
    existing.add(actualUrl);
    existing.add(link);

    log.info(`[+] [${outlet}] ${title.substring(0, 60)}`, { category, url: actualUrl });
    return article;
}

export async function discoverArticles(dataset: Dataset, deps: ArticleDiscovererDeps): Promise<StageResult> {
    log.info('Searching news feed', { terms: deps.registry.searchNames });

    const existing = buildExistingUrlIndex(dataset);
    const added: Article[] = [];
    const failedTerms: string[] = [];

    for (const term of deps.registry.searchNames) {
        const termLog = log.child({ query: term });
        try {
            const entries = await deps.feedReader.parse(buildNewsFeedUrl(term, deps.registry));

            for (const entry of entries.slice(0, deps.entryLimit)) {
                try {
                    const article = await processEntry(entry, dataset, existing, deps);
                    if (article) {
                        added.push(article);
                    }
                } catch (itemError) {
                    termLog.error('Error processing feed entry', itemError, { link: entry.link });
                }
            }
        } catch (error) {
            failedTerms.push(term);
            termLog.error('Feed search failed', error);
        }
    }

    log.info('News search finished', { added: added.length, failedTerms: failedTerms.length });

    if (added.length > 0) {
        return { status: 'changed', added: added.length, summary: `${added.length} new articles` };
    }
    if (failedTerms.length === deps.registry.searchNames.length) {
        return { status: 'failed', reason: `feed search failed for every term: ${failedTerms.join(', ')}` };
    }
    return { status: 'unchanged', reason: 'no new articles' };
}
