/**
 * Dataset persistence
 * Reads the JSON dataset (or starts an empty one) and writes it back in full
 */
import { readFile, writeFile } from 'fs/promises';
import { z } from 'zod';
import { DatasetLoadError } from '../errors.js';
import { createLogger } from '../observability/logger.js';
import type { Clock } from '../services/clock.js';
import type { CountStat, Dataset, RatingStat, StatEntry, Stats } from './types.js';

const log = createLogger({ stage: 'load' });

const recordSchema = z.record(z.unknown());

// Known top-level keys are validated; anything else in the file is kept as-is
const datasetFileSchema = z.object({
    last_updated: z.string().nullable().optional(),
    stats: z.record(recordSchema).default({}),
    tv_shows: z.array(recordSchema).default([]),
    health_media: z.array(recordSchema).default([]),
    news_media: z.array(recordSchema).default([]),
}).passthrough();

/**
 * Hand-edited numbers may be stored as strings such as "49,234"
 */
function toNumber(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value.replace(/,/g, '').trim());
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

function countStat(entry: StatEntry | undefined): CountStat {
    const count = toNumber(entry?.count);
    if (count === null) {
        // display must describe the stored count
        return { ...entry, count: 0, display: '0+' };
    }
    const display = typeof entry?.display === 'string' ? entry.display : `${count}+`;
    return { ...entry, count, display };
}

function ratingStat(entry: StatEntry | undefined): RatingStat {
    return { ...entry, score: toNumber(entry?.score) ?? 0 };
}

/**
 * Fill in the four known stats without disturbing fields already present
 */
export function ensureStats(stats: Record<string, StatEntry>): Stats {
    return {
        ...stats,
        facebook_followers: countStat(stats.facebook_followers),
        google_rating: ratingStat(stats.google_rating),
        tv_episodes: countStat(stats.tv_episodes),
        media_exposure: countStat(stats.media_exposure),
    };
}

export function createEmptyDataset(): Dataset {
    return {
        last_updated: null,
        stats: ensureStats({}),
        tv_shows: [],
        health_media: [],
        news_media: [],
    };
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Parse dataset file contents
 */
export function parseDataset(content: string, filePath: string): Dataset {
    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        throw new DatasetLoadError(filePath, 'invalid JSON', { cause: error });
    }

    const result = datasetFileSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
        throw new DatasetLoadError(filePath, issues);
    }

    // Known keys first in a fixed order, hand-added keys after them
    const { last_updated, stats, tv_shows, health_media, news_media, ...rest } = result.data;
    return {
        last_updated: last_updated ?? null,
        stats: ensureStats(stats),
        tv_shows,
        health_media,
        news_media,
        ...rest,
    };
}

/**
 * Load the persisted dataset.
 * A missing file yields an empty dataset; any other failure is fatal.
 */
export async function loadDataset(filePath: string): Promise<Dataset> {
    let content: string;
    try {
        content = await readFile(filePath, 'utf-8');
    } catch (error) {
        if (isMissingFile(error)) {
            log.info('Dataset file not found, starting empty', { filePath });
            return createEmptyDataset();
        }
        throw new DatasetLoadError(filePath, 'read failed', { cause: error });
    }

    const dataset = parseDataset(content, filePath);
    log.info('Dataset loaded', {
        filePath,
        tvShows: dataset.tv_shows.length,
        healthMedia: dataset.health_media.length,
        newsMedia: dataset.news_media.length,
    });
    return dataset;
}

/**
 * Stamp and overwrite the dataset file
 */
export async function saveDataset(filePath: string, dataset: Dataset, clock: Clock): Promise<void> {
    dataset.last_updated = clock.timestamp();
    await writeFile(filePath, JSON.stringify(dataset, null, 2), 'utf-8');
    createLogger({ stage: 'save' }).info('Dataset saved', {
        filePath,
        lastUpdated: dataset.last_updated,
    });
}
