/**
 * Stage result and external collaborator interfaces
 */

/**
 * Outcome of one pipeline stage.
 * Stages never throw for recoverable problems; they report `failed` instead.
 */
export type StageResult =
    | { status: 'changed'; added: number; summary: string }
    | { status: 'unchanged'; reason: string }
    | { status: 'failed'; reason: string };

/**
 * Fully rendered page content (client-side scripts executed)
 */
export interface PageRenderer {
    render(url: string): Promise<string>;
}

/**
 * Raw response body of a GET request
 */
export interface TextFetcher {
    fetchText(url: string, headers: Record<string, string>): Promise<string>;
}

export interface FeedEntry {
    title: string;
    link: string;
    /** ISO-8601 publish timestamp, when the feed provides one */
    published?: string;
}

export interface FeedReader {
    parse(feedUrl: string): Promise<FeedEntry[]>;
}

/**
 * Canonical article URL for a (possibly redirecting) link, or null
 */
export interface UrlResolver {
    resolve(url: string): Promise<string | null>;
}

export interface VideoResult {
    id: string;
    title: string;
    /** YYYYMMDD as reported by the platform */
    uploadDate?: string;
}

export interface VideoSearch {
    /** Probe for the search tool, installing it if possible */
    ensureAvailable(): Promise<boolean>;
    search(query: string, limit: number): Promise<VideoResult[]>;
}
