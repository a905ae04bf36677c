/**
 * Shared test data
 */
import { parseMediaRegistry, type MediaRegistry } from '../../src/config/registry.js';
import { createEmptyDataset } from '../../src/dataset/store.js';
import type { Dataset } from '../../src/dataset/types.js';
import type { Clock } from '../../src/services/clock.js';

export const testRegistry: MediaRegistry = parseMediaRegistry({
    searchNames: ['楊智鈞', '俠醫楊智鈞'],
    facebookPageUrl: 'https://www.facebook.com/test.clinic/',
    ratingQuery: '富足診所',
    locale: 'zh-TW',
    newsFeed: {
        baseUrl: 'https://news.google.com/rss/search',
        hl: 'zh-TW',
        gl: 'TW',
        ceid: 'TW:zh-Hant',
    },
    newsOutlets: {
        '自由時報': ['ltn.com.tw'],
        '聯合報／元氣網': ['udn.com'],
        'ETtoday': ['ettoday.net'],
        'Yahoo 新聞': ['tw.news.yahoo.com', 'yahoo.com'],
    },
    healthOutlets: {
        '早安健康': { domains: ['edh.tw'], role: '專欄作者' },
        '康健雜誌': { domains: ['commonhealth.com.tw'], role: '' },
    },
    tvShows: {
        '醫師好辣': { network: '東森' },
        '健康2.0': { network: 'TVBS' },
    },
});

export const fixedClock: Clock = {
    today: () => '2024-06-01',
    timestamp: () => '2024-06-01T10:00:00.000+08:00',
};

export function datasetWith(records: Partial<Pick<Dataset, 'tv_shows' | 'health_media' | 'news_media'>>): Dataset {
    return { ...createEmptyDataset(), ...records };
}
