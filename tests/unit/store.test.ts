/**
 * Dataset Store Tests
 * Reads and writes real files under a temporary directory
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

vi.mock('../../src/observability/logger.js', () => {
    const mockLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn() };
    mockLogger.child.mockReturnValue(mockLogger);
    return { logger: mockLogger, createLogger: () => mockLogger };
});

import { createEmptyDataset, loadDataset, parseDataset, saveDataset } from '../../src/dataset/store.js';
import { DatasetLoadError } from '../../src/errors.js';
import { fixedClock } from '../helpers/fixtures.js';

describe('Dataset Store', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'media-kit-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should start from an empty dataset when the file is missing', async () => {
        const dataset = await loadDataset(join(dir, 'missing.json'));

        expect(dataset).toEqual(createEmptyDataset());
        expect(dataset.stats.facebook_followers).toEqual({ count: 0, display: '0+' });
        expect(dataset.stats.google_rating).toEqual({ score: 0 });
    });

    it('should reject a file that is not JSON', async () => {
        const filePath = join(dir, 'data.json');
        await writeFile(filePath, '{not json', 'utf-8');

        await expect(loadDataset(filePath)).rejects.toThrow(DatasetLoadError);
        await expect(loadDataset(filePath)).rejects.toThrow(`Cannot load dataset from ${filePath}: invalid JSON`);
    });

    it('should reject a file with the wrong shape', () => {
        expect(() => parseDataset('{"tv_shows": "nope"}', 'data.json'))
            .toThrow('Cannot load dataset from data.json: tv_shows: Expected array, received string');
    });

    it('should keep hand-edited fields and unknown keys', () => {
        const dataset = parseDataset(JSON.stringify({
            last_updated: '2024-01-01T00:00:00.000+08:00',
            stats: { google_rating: { score: 4.8, review_count: 120 } },
            news_media: [{ url: 'https://news.ltn.com.tw/news/life/1', note: 'featured' }],
            press_kit: { pdf: 'kit.pdf' },
        }), 'data.json');

        expect(dataset.stats.google_rating).toEqual({ score: 4.8, review_count: 120 });
        expect(dataset.stats.tv_episodes).toEqual({ count: 0, display: '0+' });
        expect(dataset.news_media[0].note).toBe('featured');
        expect(dataset.tv_shows).toEqual([]);
        expect(dataset.press_kit).toEqual({ pdf: 'kit.pdf' });
        expect(Object.keys(dataset)).toEqual([
            'last_updated', 'stats', 'tv_shows', 'health_media', 'news_media', 'press_kit',
        ]);
    });

    it('should read hand-edited numeric strings as numbers', () => {
        const dataset = parseDataset(JSON.stringify({
            stats: {
                facebook_followers: { count: '49,234', display: '4.9萬+' },
                google_rating: { score: '4.8' },
            },
        }), 'data.json');

        expect(dataset.stats.facebook_followers).toEqual({ count: 49234, display: '4.9萬+' });
        expect(dataset.stats.google_rating).toEqual({ score: 4.8 });
    });

    it('should reset the display along with an unreadable count', () => {
        const dataset = parseDataset(JSON.stringify({
            stats: { tv_episodes: { count: 'lots', display: '30+' } },
        }), 'data.json');

        expect(dataset.stats.tv_episodes).toEqual({ count: 0, display: '0+' });
    });

    it('should write indented JSON stamped with the run timestamp', async () => {
        const filePath = join(dir, 'data.json');
        const dataset = createEmptyDataset();
        dataset.news_media.push({ id: 'ne-1', title: '楊智鈞醫師', url: 'https://example.com/1' });

        await saveDataset(filePath, dataset, fixedClock);

        const content = await readFile(filePath, 'utf-8');
        expect(content.startsWith('{\n  "last_updated": "2024-06-01T10:00:00.000+08:00",\n  "stats": {')).toBe(true);
        expect(content).toContain('"title": "楊智鈞醫師"');
        expect(content.endsWith('}')).toBe(true);
        expect(await loadDataset(filePath)).toEqual(dataset);
    });
});
