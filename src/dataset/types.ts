/**
 * Dataset model
 *
 * The persisted file is the source of truth and may carry hand-edited fields,
 * so stored records stay loosely typed; records created by the discoverers
 * use the strict Article / Appearance shapes.
 */

export type StoredRecord = Record<string, unknown>;

export type StatEntry = Record<string, unknown>;

export type CountStat = StatEntry & {
    count: number;
    display: string;
};

export type RatingStat = StatEntry & {
    score: number;
};

export type Stats = Record<string, StatEntry> & {
    facebook_followers: CountStat;
    google_rating: RatingStat;
    tv_episodes: CountStat;
    media_exposure: CountStat;
};

export const RECORD_SECTIONS = ['tv_shows', 'health_media', 'news_media'] as const;
export type RecordSection = typeof RECORD_SECTIONS[number];

export type ArticleCategory = 'health_media' | 'news_media';

export interface Dataset {
    last_updated: string | null;
    stats: Stats;
    tv_shows: StoredRecord[];
    health_media: StoredRecord[];
    news_media: StoredRecord[];
    [key: string]: unknown;
}

export type Article = {
    id: string;
    outlet: string;
    title: string;
    date: string;
    url: string;
    source: string;
    added_date: string;
    outlet_role?: string;
};

export type Appearance = {
    id: string;
    show: string;
    show_network: string;
    title: string;
    date: string;
    url: string;
    source: string;
    added_date: string;
};

// Marks records created by this pipeline rather than entered by hand
export const AUTO_SOURCE = 'auto_search';
