/**
 * yt-dlp Search Tests
 * Uses a fake command runner; no process is spawned
 */
import { describe, it, expect, vi } from 'vitest';

vi.mock('../../src/observability/logger.js', () => {
    const mockLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn() };
    mockLogger.child.mockReturnValue(mockLogger);
    return { logger: mockLogger, createLogger: () => mockLogger };
});

import { parseSearchOutput, YtDlpSearch } from '../../src/media/ytdlp.js';
import type { CommandRunner } from '../../src/media/process.js';

function createSearch(runner: CommandRunner): YtDlpSearch {
    return new YtDlpSearch({ bin: 'yt-dlp', pythonBin: 'python3', timeoutMs: 30000, runner });
}

describe('yt-dlp search', () => {
    describe('parseSearchOutput', () => {
        it('should parse one record per line', () => {
            const stdout = [
                JSON.stringify({ id: 'abc123', title: '醫師好辣 楊智鈞', upload_date: '20240131' }),
                JSON.stringify({ id: 'def456', title: '健康2.0', upload_date: null }),
                '',
            ].join('\n');

            expect(parseSearchOutput(stdout)).toEqual([
                { id: 'abc123', title: '醫師好辣 楊智鈞', uploadDate: '20240131' },
                { id: 'def456', title: '健康2.0', uploadDate: undefined },
            ]);
        });

        it('should skip lines that are not valid records', () => {
            const stdout = [
                'WARNING: something odd',
                JSON.stringify({ title: 'no id' }),
                JSON.stringify({ id: 'ok1' }),
            ].join('\n');

            expect(parseSearchOutput(stdout)).toEqual([{ id: 'ok1', title: '', uploadDate: undefined }]);
        });
    });

    describe('ensureAvailable', () => {
        it('should not install when the probe succeeds', async () => {
            const runner = vi.fn<CommandRunner>().mockResolvedValue({ code: 0, stdout: '2024.05.27', stderr: '' });
            const search = createSearch(runner);

            await expect(search.ensureAvailable()).resolves.toBe(true);
            expect(runner).toHaveBeenCalledTimes(1);
            expect(runner).toHaveBeenCalledWith('yt-dlp', ['--version'], { timeoutMs: 15000 });
        });

        it('should install and probe again when the tool is missing', async () => {
            const runner = vi.fn<CommandRunner>()
                .mockRejectedValueOnce(new Error('spawn yt-dlp ENOENT'))
                .mockResolvedValueOnce({ code: 0, stdout: 'Successfully installed yt-dlp', stderr: '' })
                .mockResolvedValueOnce({ code: 0, stdout: '2024.05.27', stderr: '' });
            const search = createSearch(runner);

            await expect(search.ensureAvailable()).resolves.toBe(true);
            expect(runner.mock.calls).toEqual([
                ['yt-dlp', ['--version'], { timeoutMs: 15000 }],
                ['python3', ['-m', 'pip', 'install', 'yt-dlp'], { timeoutMs: 180000 }],
                ['yt-dlp', ['--version'], { timeoutMs: 15000 }],
            ]);
        });

        it('should report unavailable when the install does not help, and cache the answer', async () => {
            const runner = vi.fn<CommandRunner>().mockRejectedValue(new Error('spawn ENOENT'));
            const search = createSearch(runner);

            await expect(search.ensureAvailable()).resolves.toBe(false);
            await expect(search.ensureAvailable()).resolves.toBe(false);
            expect(runner).toHaveBeenCalledTimes(3);
        });
    });

    describe('search', () => {
        it('should run a flat search without downloading', async () => {
            const runner = vi.fn<CommandRunner>().mockResolvedValue({
                code: 0,
                stdout: JSON.stringify({ id: 'abc123', title: 'T' }),
                stderr: '',
            });
            const search = createSearch(runner);

            const results = await search.search('醫師好辣 楊智鈞', 5);

            expect(results).toEqual([{ id: 'abc123', title: 'T', uploadDate: undefined }]);
            expect(runner).toHaveBeenCalledWith(
                'yt-dlp',
                ['ytsearch5:醫師好辣 楊智鈞', '--dump-json', '--no-download', '--flat-playlist'],
                { timeoutMs: 30000 }
            );
        });

        it('should still parse output when the exit code is non-zero', async () => {
            const runner = vi.fn<CommandRunner>().mockResolvedValue({
                code: 1,
                stdout: JSON.stringify({ id: 'abc123', title: 'T' }),
                stderr: 'ERROR: one video unavailable',
            });

            const results = await createSearch(runner).search('q', 5);

            expect(results).toHaveLength(1);
        });
    });
});
