/**
 * yt-dlp video search
 * Queries "ytsearchN:<query>" without downloading and parses one JSON record per line
 */
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { createLogger } from '../observability/logger.js';
import type { VideoResult, VideoSearch } from '../fetchers/types.js';
import { runCommand, type CommandRunner } from './process.js';

const log = createLogger({ stage: 'tv' });

const INSTALL_TIMEOUT_MS = 180000;
const PROBE_TIMEOUT_MS = 15000;

const searchRecordSchema = z.object({
    id: z.string().min(1),
    title: z.string().default(''),
    upload_date: z.string().nullish(),
});

/**
 * Parse --dump-json output. Lines that are not valid records are skipped.
 */
export function parseSearchOutput(stdout: string): VideoResult[] {
    const results: VideoResult[] = [];
    let skipped = 0;

    for (const line of stdout.split('\n')) {
        const trimmed = line.trim();
        if (!trimmed) {
            continue;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(trimmed);
        } catch {
            skipped++;
            continue;
        }

        const parsed = searchRecordSchema.safeParse(raw);
        if (!parsed.success) {
            skipped++;
            continue;
        }

        results.push({
            id: parsed.data.id,
            title: parsed.data.title,
            uploadDate: parsed.data.upload_date || undefined,
        });
    }

    if (skipped > 0) {
        log.debug('Skipped unparseable search output lines', { skipped });
    }

    return results;
}

export interface YtDlpOptions {
    bin: string;
    pythonBin: string;
    timeoutMs: number;
    runner?: CommandRunner;
}

export class YtDlpSearch implements VideoSearch {
    private readonly run: CommandRunner;
    private available: boolean | null = null;

    constructor(private readonly options: YtDlpOptions) {
        this.run = options.runner ?? runCommand;
    }

    private async probe(): Promise<boolean> {
        try {
            const result = await this.run(this.options.bin, ['--version'], { timeoutMs: PROBE_TIMEOUT_MS });
            return result.code === 0;
        } catch (error) {
            log.debug('yt-dlp probe failed', { error: errorMessage(error) });
            return false;
        }
    }

    private async install(): Promise<void> {
        try {
            const result = await this.run(
                this.options.pythonBin,
                ['-m', 'pip', 'install', 'yt-dlp'],
                { timeoutMs: INSTALL_TIMEOUT_MS }
            );
            if (result.code !== 0) {
                log.warn('pip install yt-dlp failed', { code: result.code, stderr: result.stderr.slice(-500) });
            }
        } catch (error) {
            log.warn('Could not run pip install yt-dlp', { error: errorMessage(error) });
        }
    }

    async ensureAvailable(): Promise<boolean> {
        if (this.available !== null) {
            return this.available;
        }

        if (await this.probe()) {
            this.available = true;
            return true;
        }

        log.info('yt-dlp not installed, trying pip install');
        await this.install();
        this.available = await this.probe();
        return this.available;
    }

    async search(query: string, limit: number): Promise<VideoResult[]> {
        const result = await this.run(
            this.options.bin,
            [`ytsearch${limit}:${query}`, '--dump-json', '--no-download', '--flat-playlist'],
            { timeoutMs: this.options.timeoutMs }
        );

        if (result.code !== 0) {
            log.warn('yt-dlp exited with non-zero code', {
                query,
                code: result.code,
                stderr: result.stderr.slice(-500),
            });
        }

        return parseSearchOutput(result.stdout);
    }
}
