/**
 * Outlet classification
 * Maps a discovered article to a known outlet and decides its collection
 */
import type { MediaRegistry } from '../config/registry.js';
import type { ArticleCategory } from '../dataset/types.js';

export const UNKNOWN_OUTLET = '其他媒體';

function hostnameOf(url: string): string | null {
    try {
        return new URL(url).hostname.toLowerCase();
    } catch {
        return null;
    }
}

/**
 * Same domain or a subdomain of it
 */
function hostMatches(host: string, domain: string): boolean {
    const normalized = domain.toLowerCase();
    return host === normalized || host.endsWith(`.${normalized}`);
}

/**
 * News outlets first, then health outlets, in registry order
 */
function outletDomainTable(registry: MediaRegistry): Array<[string, readonly string[]]> {
    return [
        ...Object.entries(registry.newsOutlets),
        ...Object.entries(registry.healthOutlets).map(
            ([name, outlet]): [string, readonly string[]] => [name, outlet.domains]
        ),
    ];
}

/**
 * Resolve the outlet name for an article.
 *
 * 1. URL host against the outlet domain tables
 * 2. Feed source label against known outlet names, ignoring "／", full-width
 *    spaces in the outlet name and ASCII spaces in the label
 * 3. The source label as given
 * 4. The URL host without a leading "www."
 */
export function classifyOutlet(url: string, sourceName: string, registry: MediaRegistry): string {
    const host = hostnameOf(url);

    if (host) {
        for (const [outletName, domains] of outletDomainTable(registry)) {
            if (domains.some(domain => hostMatches(host, domain))) {
                return outletName;
            }
        }
    }

    if (sourceName) {
        const compactSource = sourceName.replace(/ /g, '');
        const knownNames = [...Object.keys(registry.newsOutlets), ...Object.keys(registry.healthOutlets)];
        for (const outletName of knownNames) {
            if (compactSource.includes(outletName.replace(/／/g, '').replace(/　/g, ''))) {
                return outletName;
            }
        }
        return sourceName;
    }

    if (!host) {
        return UNKNOWN_OUTLET;
    }
    return host.replace(/^www\./, '');
}

export function determineCategory(outlet: string, registry: MediaRegistry): ArticleCategory {
    return Object.hasOwn(registry.healthOutlets, outlet) ? 'health_media' : 'news_media';
}

/**
 * Editorial role for a health outlet, if the registry defines a non-empty one
 */
export function outletRole(outlet: string, registry: MediaRegistry): string | undefined {
    if (!Object.hasOwn(registry.healthOutlets, outlet)) {
        return undefined;
    }
    return registry.healthOutlets[outlet].role || undefined;
}
