/**
 * Headless Chromium page renderer
 * The follower count is rendered client-side, so a plain GET is not enough.
 */
import { chromium } from 'playwright-core';
import { logger } from '../observability/logger.js';
import type { PageRenderer } from '../fetchers/types.js';

export interface ChromiumRendererOptions {
    userAgent: string;
    locale: string;
    timeoutMs: number;
    // Extra wait after DOMContentLoaded for client-side rendering
    settleMs: number;
    executablePath?: string | null;
}

export function createChromiumRenderer(options: ChromiumRendererOptions): PageRenderer {
    return {
        async render(url: string): Promise<string> {
            const browser = await chromium.launch({
                headless: true,
                executablePath: options.executablePath || undefined,
                timeout: options.timeoutMs,
            });

            try {
                const context = await browser.newContext({
                    userAgent: options.userAgent,
                    locale: options.locale,
                });
                const page = await context.newPage();
                await page.goto(url, { waitUntil: 'domcontentloaded', timeout: options.timeoutMs });
                await page.waitForTimeout(options.settleMs);

                const content = await page.content();
                logger.debug('Rendered page', { url, length: content.length });
                return content;
            } finally {
                await browser.close();
            }
        },
    };
}
