/**
 * Configuration Tests
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

describe('Configuration', () => {
    beforeEach(() => {
        vi.resetModules();
    });

    afterEach(() => {
        vi.unstubAllEnvs();
        vi.restoreAllMocks();
    });

    it('should apply defaults when nothing is set', async () => {
        const { config } = await import('../../src/config/index.js');

        expect(config.dataFile).toBe('data.json');
        expect(config.utcOffsetMinutes).toBe(480);
        expect(config.feedEntryLimit).toBe(15);
        expect(config.videoResultLimit).toBe(5);
        expect(config.followerMinCount).toBe(1000);
        expect(config.chromiumExecutablePath).toBeNull();
    });

    it('should read values from the environment', async () => {
        vi.stubEnv('DATA_FILE', '/srv/media/data.json');
        vi.stubEnv('FEED_ENTRY_LIMIT', '20');
        vi.stubEnv('CHROMIUM_EXECUTABLE_PATH', '/usr/bin/chromium');

        const { config } = await import('../../src/config/index.js');

        expect(config.dataFile).toBe('/srv/media/data.json');
        expect(config.feedEntryLimit).toBe(20);
        expect(config.chromiumExecutablePath).toBe('/usr/bin/chromium');
    });

    it('should exit when a value is invalid', async () => {
        vi.stubEnv('FEED_ENTRY_LIMIT', 'many');
        const exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
            throw new Error(`process.exit(${code})`);
        });
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        await expect(import('../../src/config/index.js')).rejects.toThrow('process.exit(1)');
        expect(exitSpy).toHaveBeenCalledWith(1);
        expect(errorSpy).toHaveBeenCalledWith('  - FEED_ENTRY_LIMIT: Expected number, received nan');
    });

    it('should map config paths to environment variable names', async () => {
        const { pathToEnvVar } = await import('../../src/config/index.js');

        expect(pathToEnvVar('utcOffsetMinutes')).toBe('UTC_OFFSET_MINUTES');
        expect(pathToEnvVar('ytdlpBin')).toBe('YTDLP_BIN');
    });
});
