/**
 * Follower Count Fetcher
 * Reads the social page follower count from rendered page content
 */
import { errorMessage } from '../errors.js';
import { createLogger } from '../observability/logger.js';
import type { MediaRegistry } from '../config/registry.js';
import type { Dataset } from '../dataset/types.js';
import type { PageRenderer, StageResult } from './types.js';

const log = createLogger({ stage: 'followers' });

interface FollowerPattern {
    pattern: RegExp;
    // "4.9萬" style, in units of 10,000
    abbreviated: boolean;
}

// Page shows counts like "49,234位追蹤者" or "4.9萬位追蹤者"
export const FOLLOWER_PATTERNS: readonly FollowerPattern[] = [
    { pattern: /([\d,]+)\s*位追蹤者/, abbreviated: false },
    { pattern: /([\d.]+)\s*萬\s*位?追蹤者/, abbreviated: true },
    { pattern: /([\d,]+)\s*followers/, abbreviated: false },
    { pattern: /"follower_count":\s*(\d+)/, abbreviated: false },
    { pattern: /([\d,]+)\s*人追蹤/, abbreviated: false },
];

function toCount(raw: string, abbreviated: boolean): number {
    if (abbreviated) {
        return Math.trunc(parseFloat(raw) * 10000);
    }
    return parseInt(raw.replace(/,/g, ''), 10);
}

/**
 * First pattern match whose value exceeds the plausibility floor
 */
export function extractFollowerCount(content: string, minCount: number): number | null {
    for (const { pattern, abbreviated } of FOLLOWER_PATTERNS) {
        const match = content.match(pattern);
        if (!match) {
            continue;
        }
        const count = toCount(match[1], abbreviated);
        if (Number.isFinite(count) && count > minCount) {
            return count;
        }
    }
    return null;
}

/**
 * 49234 -> "4.9萬+", 50000 -> "5萬+", 800 -> "800+"
 */
export function formatFollowerCount(count: number): string {
    if (count >= 10000) {
        const wan = count / 10000;
        return Number.isInteger(wan) ? `${wan}萬+` : `${wan.toFixed(1)}萬+`;
    }
    return `${count.toLocaleString('en-US')}+`;
}

export interface FollowerFetcherDeps {
    renderer: PageRenderer;
    registry: MediaRegistry;
    minCount: number;
}

export async function updateFollowerCount(dataset: Dataset, deps: FollowerFetcherDeps): Promise<StageResult> {
    log.info('Fetching follower count', { url: deps.registry.facebookPageUrl });

    try {
        const content = await deps.renderer.render(deps.registry.facebookPageUrl);
        const count = extractFollowerCount(content, deps.minCount);

        if (count === null) {
            log.warn('Could not extract follower count from page');
            return { status: 'unchanged', reason: 'no follower count found' };
        }

        const stat = dataset.stats.facebook_followers;
        const previous = stat.count;
        stat.count = count;
        stat.display = formatFollowerCount(count);

        log.info('Follower count updated', { previous, count, display: stat.display });
        return { status: 'changed', added: 0, summary: `followers ${previous} -> ${count}` };
    } catch (error) {
        log.error('Failed to fetch follower count', error);
        return { status: 'failed', reason: errorMessage(error) };
    }
}
