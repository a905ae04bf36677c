/**
 * Media registry: search terms, outlet tables and the TV show registry.
 * Loaded once, frozen, and handed to each stage explicitly.
 */
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { logger } from '../observability/logger.js';

const domainListSchema = z.array(z.string().min(1)).min(1).readonly();

const registrySchema = z.object({
    searchNames: z.array(z.string().min(1)).min(1).readonly(),
    facebookPageUrl: z.string().url(),
    ratingQuery: z.string().min(1),
    locale: z.string().min(1),
    newsFeed: z.object({
        baseUrl: z.string().url(),
        hl: z.string().min(1),
        gl: z.string().min(1),
        ceid: z.string().min(1),
    }).readonly(),
    newsOutlets: z.record(domainListSchema).readonly(),
    healthOutlets: z.record(z.object({
        domains: domainListSchema,
        role: z.string().default(''),
    }).readonly()).readonly(),
    tvShows: z.record(z.object({
        network: z.string(),
    }).readonly()).refine(shows => Object.keys(shows).length > 0, 'At least one TV show is required').readonly(),
}).readonly();

export type MediaRegistry = z.infer<typeof registrySchema>;
export type HealthOutlet = MediaRegistry['healthOutlets'][string];
export type TvShow = MediaRegistry['tvShows'][string];

/**
 * Validate a registry object
 */
export function parseMediaRegistry(raw: unknown): MediaRegistry {
    const result = registrySchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid media registry: ${issues}`);
    }
    return result.data;
}

/**
 * Load the registry from a JSON file
 */
export async function loadMediaRegistry(path: string): Promise<MediaRegistry> {
    const content = await readFile(path, 'utf-8');
    const registry = parseMediaRegistry(JSON.parse(content));

    logger.info('Loaded media registry', {
        path,
        searchNames: registry.searchNames.length,
        newsOutlets: Object.keys(registry.newsOutlets).length,
        healthOutlets: Object.keys(registry.healthOutlets).length,
        tvShows: Object.keys(registry.tvShows).length,
    });

    return registry;
}
